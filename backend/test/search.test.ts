import { expect } from 'chai';
import { buildPhotoSearch, escapeLike } from '@/models/photo.search.js';
import { parseDateBound } from '@/services/search.service.js';
import type { TestContext, TestUser } from './context.js';
import { authHeader, catchError, createPhoto, createTestApp, registerUser } from './context.js';

describe('photo search SQL builder', () => {
    it('escapes LIKE wildcards', () => {
        expect(escapeLike('50%_off\\')).to.equal('50\\%\\_off\\\\');
    });

    it('numbers placeholders in filter order', () => {
        const dateFrom = new Date('2024-01-01T00:00:00.000Z');
        const dateTo = new Date('2024-01-31T23:59:59.999Z');

        const sql = buildPhotoSearch({
            keyword: 'sun_set',
            tag: 'beach',
            minRating: 3,
            maxRating: 4.5,
            dateFrom,
            dateTo,
            uploader: 'alice',
            userId: 7,
            sortBy: 'rating',
            order: 'asc',
            limit: 20,
            offset: 0,
        });

        expect(sql.conditions).to.deep.equal([
            'p.description ILIKE $1',
            'EXISTS (SELECT 1 FROM photo_tags pt JOIN tags t ON t.id = pt.tag_id WHERE pt.photo_id = p.id AND t.name = $2)',
            'ROUND(r.average, 1) >= $3',
            'ROUND(r.average, 1) <= $4',
            'p.created_at >= $5',
            'p.created_at <= $6',
            'u.username = $7',
            'p.owner_id = $8',
        ]);
        expect(sql.values).to.deep.equal(['%sun\\_set%', 'beach', 3, 4.5, dateFrom, dateTo, 'alice', 7]);
        expect(sql.where).to.equal(`WHERE ${sql.conditions.join(' AND ')}`);
        expect(sql.orderBy).to.equal('ORDER BY r.average ASC NULLS LAST, p.id ASC');
    });

    it('leaves the WHERE clause empty without filters', () => {
        const sql = buildPhotoSearch({ sortBy: 'created_at', order: 'desc', limit: 20, offset: 0 });

        expect(sql.values).to.deep.equal([]);
        expect(sql.where).to.equal('');
        expect(sql.orderBy).to.equal('ORDER BY p.created_at DESC, p.id DESC');
    });
});

describe('parseDateBound', () => {
    it('extends a plain upper-bound date to the end of the day', () => {
        expect(parseDateBound('2024-03-05', 'date_to', true)?.toISOString()).to.equal('2024-03-05T23:59:59.999Z');
        expect(parseDateBound('2024-03-05', 'date_from')?.toISOString()).to.equal('2024-03-05T00:00:00.000Z');
    });

    it('keeps an explicit time', () => {
        expect(parseDateBound('2024-03-05T10:00:00Z', 'date_to', true)?.toISOString())
            .to.equal('2024-03-05T10:00:00.000Z');
    });

    it('treats blank input as absent', () => {
        expect(parseDateBound('  ', 'date_from')).to.equal(undefined);
    });

    it('rejects unparseable dates', async () => {
        const err = await catchError(Promise.resolve().then(() => parseDateBound('yesterday', 'date_from')));
        expect(err).to.have.property('code', 'INVALID_DATE');
        expect(err).to.have.property('message', 'date_from must be an ISO 8601 date');
    });
});

describe('SEARCH TESTS:', () => {
    let ctx: TestContext;
    let admin: TestUser;
    let alice: TestUser;
    let bob: TestUser;
    const photos = { sunset: 0, cat: 0, volleyball: 0, plain: 0 };

    before(async () => {
        ctx = await createTestApp();
        admin = await registerUser(ctx.app, 'admin');
        alice = await registerUser(ctx.app, 'alice');
        bob = await registerUser(ctx.app, 'bob');

        photos.sunset = await createPhoto(ctx.app, alice.access_token, {
            description: 'Sunset over the sea',
            tags: 'beach,sunset',
        });
        photos.cat = await createPhoto(ctx.app, alice.access_token, { description: 'Cat on a sofa', tags: 'cat' });
        photos.volleyball = await createPhoto(ctx.app, bob.access_token, {
            description: 'Beach volleyball at sunset',
            tags: 'beach,sport',
        });
        photos.plain = await createPhoto(ctx.app, bob.access_token);

        const votes: Array<[TestUser, number, number]> = [
            [bob, photos.sunset, 5],
            [admin, photos.sunset, 4],
            [bob, photos.cat, 2],
            [alice, photos.volleyball, 3],
        ];
        for (const [rater, photoId, score] of votes) {
            const response = await ctx.app.inject({
                method: 'POST',
                url: `/photos/${photoId}/ratings`,
                headers: authHeader(rater.access_token),
                body: { score },
            });
            expect(response.statusCode).to.equal(201);
        }
    });

    after(async () => {
        await ctx.app.close();
    });

    async function search(query: string) {
        const response = await ctx.app.inject({
            method: 'GET',
            url: `/photos${query}`,
            headers: authHeader(alice.access_token),
        });
        return response;
    }

    async function searchIds(query: string): Promise<number[]> {
        const response = await search(query);
        expect(response.statusCode).to.equal(200);
        return response.json().items.map((photo: { id: number }) => photo.id);
    }

    describe('[GET /photos]', () => {
        it('lists newest first with page metadata', async () => {
            const response = await search('');
            const body = response.json();

            expect(body.items.map((photo: { id: number }) => photo.id))
                .to.deep.equal([photos.plain, photos.volleyball, photos.cat, photos.sunset]);
            expect(body).to.include({ total: 4, page: 1, size: 20, pages: 1 });
        });

        it('matches keywords case-insensitively', async () => {
            expect(await searchIds('?keyword=SUNSET')).to.deep.equal([photos.volleyball, photos.sunset]);
        });

        it('filters by normalized tag', async () => {
            expect(await searchIds('?tag=Beach')).to.deep.equal([photos.volleyball, photos.sunset]);
        });

        it('filters by rating bounds and skips unrated photos', async () => {
            expect(await searchIds('?min_rating=3')).to.deep.equal([photos.volleyball, photos.sunset]);
            expect(await searchIds('?max_rating=2.5')).to.deep.equal([photos.cat]);
        });

        it('rejects an inverted rating range', async () => {
            const response = await search('?min_rating=4&max_rating=3');

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('INVALID_RATING_RANGE');
        });

        it('filters by uploader', async () => {
            expect(await searchIds('?uploader=alice')).to.deep.equal([photos.cat, photos.sunset]);
        });

        it('combines filters with AND', async () => {
            expect(await searchIds('?tag=beach&uploader=bob')).to.deep.equal([photos.volleyball]);
        });

        it('sorts by rating with unrated photos last', async () => {
            expect(await searchIds('?sort_by=rating&sort_order=desc'))
                .to.deep.equal([photos.sunset, photos.volleyball, photos.cat, photos.plain]);
            expect(await searchIds('?sort_by=rating&sort_order=asc'))
                .to.deep.equal([photos.cat, photos.volleyball, photos.sunset, photos.plain]);
        });

        it('filters by upload date', async () => {
            expect(await searchIds('?date_from=2024-01-02')).to.deep.equal([]);
            expect(await searchIds('?date_to=2024-01-01')).to.have.length(4);
        });

        it('rejects an inverted date range', async () => {
            const response = await search('?date_from=2024-02-01&date_to=2024-01-01');

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('INVALID_DATE_RANGE');
        });

        it('paginates with page and size', async () => {
            const response = await search('?size=3&page=2');
            const body = response.json();

            expect(body.items.map((photo: { id: number }) => photo.id)).to.deep.equal([photos.sunset]);
            expect(body).to.include({ total: 4, page: 2, size: 3, pages: 2 });
        });

        it('rejects a page size over 100', async () => {
            const response = await search('?size=101');

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('VALIDATION_ERROR');
        });
    });

    describe('[GET /users/:userId/photos]', () => {
        it('lists the photos of one user, newest first', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: `/users/${alice.id}/photos`,
                headers: authHeader(bob.access_token),
            });

            expect(response.statusCode).to.equal(200);
            const body = response.json();
            expect(body.items.map((photo: { id: number }) => photo.id)).to.deep.equal([photos.cat, photos.sunset]);
            expect(body.total).to.equal(2);
        });

        it('returns 404 for an unknown user', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: '/users/999/photos',
                headers: authHeader(bob.access_token),
            });

            expect(response.statusCode).to.equal(404);
            expect(response.json().code).to.equal('USER_NOT_FOUND');
        });

        it('rejects a user id past the integer column range', async () => {
            const byPath = await ctx.app.inject({
                method: 'GET',
                url: '/users/3000000000/photos',
                headers: authHeader(bob.access_token),
            });
            expect(byPath.statusCode).to.equal(400);

            const byQuery = await search('?user_id=3000000000');
            expect(byQuery.statusCode).to.equal(400);
            expect(byQuery.json().code).to.equal('VALIDATION_ERROR');
        });
    });
});

describe('rating bounds', () => {
    let ctx: TestContext;
    let photoId: number;
    let viewer: TestUser;

    before(async () => {
        ctx = await createTestApp();
        const owner = await registerUser(ctx.app, 'owner');
        photoId = await createPhoto(ctx.app, owner.access_token);

        // 4, 4, 3 averages 3.666..., shown as 3.7
        for (const [username, score] of [['r_one', 4], ['r_two', 4], ['r_three', 3]] as const) {
            const rater = await registerUser(ctx.app, username);
            const response = await ctx.app.inject({
                method: 'POST',
                url: `/photos/${photoId}/ratings`,
                headers: authHeader(rater.access_token),
                body: { score },
            });
            expect(response.statusCode).to.equal(201);
            viewer = rater;
        }
    });

    after(async () => {
        await ctx.app.close();
    });

    async function searchIds(query: string): Promise<number[]> {
        const response = await ctx.app.inject({
            method: 'GET',
            url: `/photos${query}`,
            headers: authHeader(viewer.access_token),
        });
        expect(response.statusCode).to.equal(200);
        return response.json().items.map((photo: { id: number }) => photo.id);
    }

    it('compare against the average as it is displayed', async () => {
        const [photo] = (await ctx.app.inject({
            method: 'GET',
            url: '/photos?min_rating=3.7',
            headers: authHeader(viewer.access_token),
        })).json().items;
        expect(photo).to.include({ id: photoId, average_rating: 3.7 });

        expect(await searchIds('?max_rating=3.7')).to.deep.equal([photoId]);
        expect(await searchIds('?max_rating=3.6')).to.deep.equal([]);
    });
});
