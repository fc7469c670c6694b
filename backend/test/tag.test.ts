import { expect } from 'chai';
import { normalizeTags, parseTagList } from '@/services/tag.service.js';
import { ValidationError } from '@/utils/errors.js';
import type { TestContext, TestUser } from './context.js';
import { authHeader, createPhoto, createTestApp, registerUser } from './context.js';

describe('normalizeTags', () => {
    it('trims, lowercases and drops blanks and duplicates', () => {
        expect(normalizeTags([' Beach ', 'beach', '', 'SUNSET', '  '])).to.deep.equal(['beach', 'sunset']);
    });

    it('rejects tags longer than 50 characters', () => {
        expect(() => normalizeTags(['x'.repeat(51)])).to.throw(ValidationError).with.property('code', 'INVALID_TAG');
    });

    it('splits a comma-separated list', () => {
        expect(parseTagList('beach, Sunset,,cat')).to.deep.equal(['beach', 'sunset', 'cat']);
    });
});

describe('TAG TESTS:', () => {
    let ctx: TestContext;
    let owner: TestUser;
    let stranger: TestUser;
    let photoId: number;

    before(async () => {
        ctx = await createTestApp();
        owner = await registerUser(ctx.app, 'owner');
        stranger = await registerUser(ctx.app, 'stranger');
        photoId = await createPhoto(ctx.app, owner.access_token, { tags: 'beach,sunset' });
    });

    after(async () => {
        await ctx.app.close();
    });

    function patchTags(user: TestUser, body: { tags_to_insert?: string[]; tags_to_remove?: string[] }) {
        return ctx.app.inject({
            method: 'PATCH',
            url: `/photos/${photoId}/tags`,
            headers: authHeader(user.access_token),
            body,
        });
    }

    function attachTags(user: TestUser, tags: string[]) {
        return ctx.app.inject({
            method: 'POST',
            url: `/photos/${photoId}/tags`,
            headers: authHeader(user.access_token),
            body: { tags },
        });
    }

    describe('[PATCH /photos/:id/tags]', () => {
        it('adds and removes tags in one request', async () => {
            const response = await patchTags(owner, {
                tags_to_insert: ['Cat', 'dog'],
                tags_to_remove: ['sunset'],
            });

            expect(response.statusCode).to.equal(200);
            expect(response.json()).to.deep.equal({ tags: ['beach', 'cat', 'dog'] });
        });

        it('ignores a tag that is both inserted and removed', async () => {
            const response = await patchTags(owner, {
                tags_to_insert: ['bird'],
                tags_to_remove: ['bird', 'dog'],
            });

            expect(response.json()).to.deep.equal({ tags: ['beach', 'cat'] });
        });

        it('is forbidden for other users', async () => {
            const response = await patchTags(stranger, { tags_to_insert: ['spam'] });

            expect(response.statusCode).to.equal(403);
            expect(response.json().code).to.equal('FORBIDDEN');
        });

        it('requires at least one of the two lists', async () => {
            const response = await patchTags(owner, {});

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('VALIDATION_ERROR');
        });
    });

    describe('[POST /photos/:id/tags]', () => {
        it('treats an existing tag as a no-op', async () => {
            const response = await attachTags(owner, ['BEACH']);

            expect(response.statusCode).to.equal(200);
            expect(response.json()).to.deep.equal({ tags: ['beach', 'cat'] });
        });

        it('fills the photo up to five tags', async () => {
            const response = await attachTags(owner, ['one', 'two', 'three']);

            expect(response.json()).to.deep.equal({ tags: ['beach', 'cat', 'one', 'three', 'two'] });
        });

        it('rejects a sixth tag and keeps the current set', async () => {
            const response = await attachTags(owner, ['six']);

            expect(response.statusCode).to.equal(400);
            expect(response.json()).to.deep.equal({
                success: false,
                error: 'A photo can have at most 5 tags',
                code: 'TOO_MANY_TAGS',
            });
            expect([...(ctx.db.photoTags.get(photoId) ?? [])].sort())
                .to.deep.equal(['beach', 'cat', 'one', 'three', 'two']);
        });

        it('still allows swapping a tag on a full photo', async () => {
            const response = await patchTags(owner, {
                tags_to_insert: ['six'],
                tags_to_remove: ['one'],
            });

            expect(response.json()).to.deep.equal({ tags: ['beach', 'cat', 'six', 'three', 'two'] });
        });

        it('returns 404 for an unknown photo', async () => {
            const response = await ctx.app.inject({
                method: 'POST',
                url: '/photos/999/tags',
                headers: authHeader(owner.access_token),
                body: { tags: ['beach'] },
            });

            expect(response.statusCode).to.equal(404);
            expect(response.json().code).to.equal('PHOTO_NOT_FOUND');
        });
    });
});
