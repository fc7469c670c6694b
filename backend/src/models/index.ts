import type { Pool } from 'pg';
import type { Repositories } from '@/types/repositories.js';
import { UserModel } from './user.model.js';
import { PhotoModel } from './photo.model.js';
import { TagModel } from './tag.model.js';
import { CommentModel } from './comment.model.js';
import { RatingModel } from './rating.model.js';
import { TransformationModel } from './transformation.model.js';

export function createPgRepositories(db: Pool): Repositories {
    return {
        users: new UserModel(db),
        photos: new PhotoModel(db),
        tags: new TagModel(db),
        comments: new CommentModel(db),
        ratings: new RatingModel(db),
        transformations: new TransformationModel(db),
    };
}
