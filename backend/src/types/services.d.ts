import type { AuthService } from '@/services/auth.service.js';
import type { UserService } from '@/services/user.service.js';
import type { PhotoService } from '@/services/photo.service.js';
import type { TagService } from '@/services/tag.service.js';
import type { SearchService } from '@/services/search.service.js';
import type { RatingService } from '@/services/rating.service.js';
import type { CommentService } from '@/services/comment.service.js';
import type { TransformationService } from '@/services/transformation.service.js';

// built once in buildApp and handed to every route plugin
export interface Services {
    auth: AuthService;
    users: UserService;
    photos: PhotoService;
    tags: TagService;
    search: SearchService;
    ratings: RatingService;
    comments: CommentService;
    transformations: TransformationService;
}

export type RouteOptions = {
    services: Services;
};
