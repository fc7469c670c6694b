/**========================================================================
 * *                  TYPE DECLARATIONS: REPOSITORIES
 *
 *   - implemented by the pg models in src/models
 *   - services only depend on these shapes
 *========================================================================**/

import type {
    Comment,
    PhotoPayload,
    PhotoTransformation,
    Rating,
    RatingSummary,
    Role,
    TransformationSpec,
    User,
} from '@/types/models.js';
import type { PhotoSearchQuery, SearchResult } from '@/types/search.js';

export type NewUser = {
    username: string;
    email: string;
    password_hash: string;
};

export type UserChanges = {
    username?: string;
    email?: string;
};

export interface UserRepository {
    // role is decided with the insert: admin when the table is empty, user otherwise
    createFirstAdminOrUser(data: NewUser): Promise<User>;
    findById(id: number): Promise<User | null>;
    findByEmail(email: string): Promise<User | null>;
    findByUsername(username: string): Promise<User | null>;
    update(id: number, changes: UserChanges): Promise<User>;
    setBanned(id: number, banned: boolean): Promise<User>;
    setRole(id: number, role: Role): Promise<User>;
}

export type NewPhoto = {
    owner_id: number;
    description: string | null;
    url: string;
    public_id: string;
    tags: string[];
};

export interface PhotoRepository {
    create(data: NewPhoto): Promise<PhotoPayload>;
    findById(id: number): Promise<PhotoPayload | null>;
    updateDescription(id: number, description: string | null): Promise<PhotoPayload>;
    delete(id: number): Promise<void>;
    countByOwner(owner_id: number): Promise<number>;
    search(query: PhotoSearchQuery): Promise<SearchResult<PhotoPayload>>;
}

export interface TagRepository {
    // applies both sets atomically; throws when the photo would exceed maxTags
    updatePhotoTags(
        photo_id: number,
        tags_to_insert: string[],
        tags_to_remove: string[],
        maxTags: number
    ): Promise<string[]>;
}

export interface CommentRepository {
    create(photo_id: number, author_id: number, body: string): Promise<Comment>;
    findById(id: number): Promise<Comment | null>;
    update(id: number, body: string): Promise<Comment>;
    delete(id: number): Promise<void>;
    listByPhoto(photo_id: number): Promise<Comment[]>;
}

export interface RatingRepository {
    // throws ConflictError on a second vote from the same rater
    create(photo_id: number, rater_id: number, score: number): Promise<Rating>;
    findById(id: number): Promise<Rating | null>;
    delete(id: number): Promise<void>;
    summarize(photo_id: number): Promise<RatingSummary>;
    listByPhoto(photo_id: number): Promise<Rating[]>;
}

export type NewTransformation = {
    photo_id: number;
    url: string;
    params: TransformationSpec;
    qr_code: string;
};

export interface TransformationRepository {
    create(data: NewTransformation): Promise<PhotoTransformation>;
    listByPhoto(photo_id: number): Promise<PhotoTransformation[]>;
}

export interface Repositories {
    users: UserRepository;
    photos: PhotoRepository;
    tags: TagRepository;
    comments: CommentRepository;
    ratings: RatingRepository;
    transformations: TransformationRepository;
}
