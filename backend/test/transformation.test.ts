import { expect } from 'chai';
import { resolveTransformation } from '@/services/transformation.service.js';
import { toTransformationSteps } from '@/services/image.storage.js';
import { ValidationError } from '@/utils/errors.js';
import type { TestContext, TestUser } from './context.js';
import { authHeader, createTestApp, registerUser, uploadPhoto } from './context.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('resolveTransformation', () => {
    it('fills in default parameters', () => {
        expect(resolveTransformation({ type: 'circle' })).to.deep.equal({ type: 'circle', size: 200 });
        expect(resolveTransformation({ type: 'rounded' })).to.deep.equal({ type: 'rounded', radius: 20 });
        expect(resolveTransformation({ type: 'blur' })).to.deep.equal({ type: 'blur', strength: 500 });
    });

    it('drops parameters the type does not use', () => {
        expect(resolveTransformation({ type: 'sepia', size: 300 })).to.deep.equal({ type: 'sepia' });
    });

    it('rejects out-of-range parameters', () => {
        expect(() => resolveTransformation({ type: 'rounded', radius: 0 }))
            .to.throw(ValidationError, 'radius must be an integer between 1 and 100');
    });

    it('maps a circle to a face-centred crop with a full radius', () => {
        expect(toTransformationSteps({ type: 'circle', size: 120 })).to.deep.equal([
            { width: 120, height: 120, crop: 'fill', gravity: 'face' },
            { radius: 'max' },
        ]);
    });
});

describe('TRANSFORMATION TESTS:', () => {
    let ctx: TestContext;
    let owner: TestUser;
    let stranger: TestUser;
    let photoId: number;
    let publicId: string;

    before(async () => {
        ctx = await createTestApp();
        owner = await registerUser(ctx.app, 'owner');
        stranger = await registerUser(ctx.app, 'stranger');

        const upload = await uploadPhoto(ctx.app, owner.access_token);
        photoId = upload.json().id;
        publicId = upload.json().public_id;
    });

    after(async () => {
        await ctx.app.close();
    });

    function transform(user: TestUser, body: object, id = photoId) {
        return ctx.app.inject({
            method: 'POST',
            url: `/photos/${id}/transform`,
            headers: authHeader(user.access_token),
            body,
        });
    }

    describe('[POST /photos/:id/transform]', () => {
        it('stores a grayscale variant with a qr code', async () => {
            const response = await transform(owner, { type: 'grayscale' });

            expect(response.statusCode).to.equal(201);
            const transformation = response.json();
            expect(transformation.photo_id).to.equal(photoId);
            expect(transformation.url).to.equal(`https://images.test/t_effect=grayscale/${publicId}.jpg`);
            expect(transformation.params).to.deep.equal({ type: 'grayscale' });
            expect(transformation.qr_code.startsWith('data:image/png;base64,')).to.equal(true);
        });

        it('applies default circle size', async () => {
            const response = await transform(owner, { type: 'circle' });

            expect(response.statusCode).to.equal(201);
            expect(response.json().params).to.deep.equal({ type: 'circle', size: 200 });
            expect(response.json().url).to.equal(
                `https://images.test/t_width=200,height=200,crop=fill,gravity=face/radius=max/${publicId}.jpg`
            );
        });

        it('rejects an unknown type', async () => {
            const response = await transform(owner, { type: 'sketch' });

            expect(response.statusCode).to.equal(400);
            expect(response.json().code).to.equal('VALIDATION_ERROR');
        });

        it('is forbidden for other users', async () => {
            const response = await transform(stranger, { type: 'sepia' });

            expect(response.statusCode).to.equal(403);
            expect(response.json().code).to.equal('FORBIDDEN');
        });

        it('returns 404 for an unknown photo', async () => {
            const response = await transform(owner, { type: 'sepia' }, 999);

            expect(response.statusCode).to.equal(404);
            expect(response.json().code).to.equal('PHOTO_NOT_FOUND');
        });
    });

    describe('[GET /photos/:id/transformations]', () => {
        it('lists transformations newest first', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: `/photos/${photoId}/transformations`,
                headers: authHeader(stranger.access_token),
            });

            expect(response.statusCode).to.equal(200);
            const { transformations } = response.json();
            expect(transformations.map((t: { params: { type: string } }) => t.params.type))
                .to.deep.equal(['circle', 'grayscale']);
        });
    });

    describe('[GET /photos/:id/qr]', () => {
        it('returns a png qr code', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: `/photos/${photoId}/qr`,
                headers: authHeader(stranger.access_token),
            });

            expect(response.statusCode).to.equal(200);
            expect(response.headers['content-type']).to.equal('image/png');
            expect(response.rawPayload.subarray(0, 8).equals(PNG_SIGNATURE)).to.equal(true);
        });

        it('returns 404 for an unknown photo', async () => {
            const response = await ctx.app.inject({
                method: 'GET',
                url: '/photos/999/qr',
                headers: authHeader(stranger.access_token),
            });

            expect(response.statusCode).to.equal(404);
        });
    });
});
