import { expect } from 'chai';
import type { TestContext, TestUser } from './context.js';
import { authHeader, createPhoto, createTestApp, registerUser, setRole } from './context.js';

describe('RATING TESTS:', () => {
    let ctx: TestContext;
    let owner: TestUser;
    let raters: TestUser[];
    let photoId: number;
    const ratingIds: number[] = [];

    before(async () => {
        ctx = await createTestApp();
        owner = await registerUser(ctx.app, 'owner');
        raters = [
            await registerUser(ctx.app, 'rater_one'),
            await registerUser(ctx.app, 'rater_two'),
            await registerUser(ctx.app, 'rater_three'),
        ];
        photoId = await createPhoto(ctx.app, owner.access_token);
    });

    after(async () => {
        await ctx.app.close();
    });

    function rate(user: TestUser, score: number, id = photoId) {
        return ctx.app.inject({
            method: 'POST',
            url: `/photos/${id}/ratings`,
            headers: authHeader(user.access_token),
            body: { score },
        });
    }

    function summary(user: TestUser) {
        return ctx.app.inject({
            method: 'GET',
            url: `/photos/${photoId}/rating`,
            headers: authHeader(user.access_token),
        });
    }

    function deleteRating(user: TestUser, ratingId: number) {
        return ctx.app.inject({
            method: 'DELETE',
            url: `/ratings/${ratingId}`,
            headers: authHeader(user.access_token),
        });
    }

    describe('[GET /photos/:id/rating]', () => {
        it('reports null and zero for an unrated photo', async () => {
            const response = await summary(owner);

            expect(response.statusCode).to.equal(200);
            expect(response.json()).to.deep.equal({
                photo_id: photoId,
                average_rating: null,
                ratings_count: 0,
            });
        });
    });

    describe('[POST /photos/:id/ratings]', () => {
        it('accepts one rating per user', async () => {
            for (const [index, score] of [3, 4, 5].entries()) {
                const response = await rate(raters[index], score);
                expect(response.statusCode).to.equal(201);

                const rating = response.json();
                expect(rating).to.include({ photo_id: photoId, rater_id: raters[index].id, score });
                ratingIds.push(rating.id);
            }

            const response = await summary(owner);
            expect(response.json()).to.deep.equal({
                photo_id: photoId,
                average_rating: 4,
                ratings_count: 3,
            });
        });

        it('shows the aggregate on the photo', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: `/photos/${photoId}`,
                headers: authHeader(raters[0].access_token),
            });

            expect(response.json()).to.include({ average_rating: 4, ratings_count: 3 });
        });

        it('rejects a second rating from the same user', async () => {
            const response = await rate(raters[0], 5);

            expect(response.statusCode).to.equal(409);
            expect(response.json()).to.deep.equal({
                success: false,
                error: 'You have already rated this photo',
                code: 'DUPLICATE_RATING',
            });
        });

        it('rejects rating your own photo', async () => {
            const response = await rate(owner, 5);

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('SELF_RATING');
        });

        for (const score of [0, 6, 2.5]) {
            it(`rejects a score of ${score}`, async () => {
                const response = await rate(raters[0], score);

                expect(response.statusCode).to.equal(400);
                expect(response.json()).to.deep.equal({
                    success: false,
                    error: 'Score must be an integer between 1 and 5',
                    code: 'INVALID_SCORE',
                });
            });
        }

        it('returns 404 for an unknown photo', async () => {
            const response = await rate(raters[0], 4, 999);

            expect(response.statusCode).to.equal(404);
            expect(response.json().code).to.equal('PHOTO_NOT_FOUND');
        });
    });

    describe('[GET /photos/:id/ratings]', () => {
        it('lists every rating', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: `/photos/${photoId}/ratings`,
                headers: authHeader(owner.access_token),
            });

            expect(response.statusCode).to.equal(200);
            const { ratings } = response.json();
            expect(ratings.map((r: { score: number }) => r.score)).to.deep.equal([3, 4, 5]);
        });
    });

    describe('[DELETE /ratings/:id]', () => {
        it('is forbidden for regular users', async () => {
            const response = await deleteRating(raters[0], ratingIds[2]);

            expect(response.statusCode).to.equal(403);
            expect(response.json().code).to.equal('FORBIDDEN');
        });

        it('lets a moderator remove a rating and recomputes the average', async () => {
            await setRole(ctx.app, owner.access_token, raters[1].id, 'moderator');

            const response = await deleteRating(raters[1], ratingIds[2]);
            expect(response.statusCode).to.equal(204);

            const updated = await summary(owner);
            expect(updated.json()).to.deep.equal({
                photo_id: photoId,
                average_rating: 3.5,
                ratings_count: 2,
            });
        });

        it('returns 404 for a rating that is gone', async () => {
            const response = await deleteRating(raters[1], ratingIds[2]);

            expect(response.statusCode).to.equal(404);
            expect(response.json().code).to.equal('RATING_NOT_FOUND');
        });

        it('goes back to null once every rating is removed', async () => {
            expect((await deleteRating(owner, ratingIds[0])).statusCode).to.equal(204);
            expect((await deleteRating(owner, ratingIds[1])).statusCode).to.equal(204);

            const updated = await summary(owner);
            expect(updated.json()).to.deep.equal({
                photo_id: photoId,
                average_rating: null,
                ratings_count: 0,
            });
        });
    });

    describe('rounding', () => {
        it('rounds the average to one decimal', async () => {
            const otherPhoto = await createPhoto(ctx.app, owner.access_token);
            await rate(raters[0], 4, otherPhoto);
            await rate(raters[1], 5, otherPhoto);
            await rate(raters[2], 5, otherPhoto);

            const response = await ctx.app.inject({
                method: 'GET',
                url: `/photos/${otherPhoto}/rating`,
                headers: authHeader(owner.access_token),
            });
            expect(response.json()).to.deep.equal({
                photo_id: otherPhoto,
                average_rating: 4.7,
                ratings_count: 3,
            });
        });
    });
});
