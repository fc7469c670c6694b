import type { Rating, RatingSummary } from '@/types/models.js';
import type { PhotoRepository, RatingRepository } from '@/types/repositories.js';
import type { Actor } from './policy.js';
import { authorize } from './policy.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';
import { roundToTenth } from '@/utils/numbers.js';

export const MIN_SCORE = 1;
export const MAX_SCORE = 5;

export function isValidScore(score: number): boolean {
    return Number.isInteger(score) && score >= MIN_SCORE && score <= MAX_SCORE;
}

export class RatingService {
    constructor(
        private photos: PhotoRepository,
        private ratings: RatingRepository
    ) {}

    /**========================================================================
     **                           SUBMIT RATING
     *? checked in order: score range -> photo exists -> not own photo
     *? a second vote from the same user is rejected by the unique
     *? (photo_id, rater_id) constraint, surfaced as DUPLICATE_RATING
     *========================================================================**/
    async submitRating(photo_id: number, rater: Actor, score: number): Promise<Rating> {
        if (!isValidScore(score)) {
            throw new ValidationError(
                'INVALID_SCORE',
                `Score must be an integer between ${MIN_SCORE} and ${MAX_SCORE}`
            );
        }

        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        authorize(rater, 'rating:create', { ownerId: photo.owner_id });

        if (photo.owner_id === rater.id) {
            throw new ValidationError('SELF_RATING', 'You cannot rate your own photo');
        }

        return this.ratings.create(photo_id, rater.id, score);
    }

    // mean rounded to one decimal; { average: null, count: 0 } when unrated
    async average(photo_id: number): Promise<RatingSummary> {
        await this.requirePhoto(photo_id);

        const summary = await this.ratings.summarize(photo_id);
        return {
            average: summary.count === 0 || summary.average === null
                ? null
                : roundToTenth(summary.average),
            count: summary.count,
        };
    }

    async deleteRating(rating_id: number, actor: Actor): Promise<void> {
        authorize(actor, 'rating:delete');

        const rating = await this.ratings.findById(rating_id);
        if (!rating) {
            throw new NotFoundError('RATING_NOT_FOUND', 'Rating');
        }
        await this.ratings.delete(rating_id);
    }

    async listRatings(photo_id: number): Promise<Rating[]> {
        await this.requirePhoto(photo_id);
        return this.ratings.listByPhoto(photo_id);
    }

    private async requirePhoto(photo_id: number) {
        const photo = await this.photos.findById(photo_id);
        if (!photo) {
            throw new NotFoundError('PHOTO_NOT_FOUND', 'Photo');
        }
        return photo;
    }
}
