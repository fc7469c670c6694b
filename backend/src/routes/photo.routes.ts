import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '@/types/services.js';
import type { PhotoSearchParams } from '@/types/search.js';
import type { TransformationRequest } from '@/services/transformation.service.js';
import { PhotoController } from '@/controllers/photo.controller.js';
import authContext from '@/plugins/auth.context.js';
import {
    attachTagsSchema,
    deletePhotoSchema,
    getPhotoSchema,
    listTransformationsSchema,
    photoQrSchema,
    searchPhotosSchema,
    transformPhotoSchema,
    updateDescriptionSchema,
    updateTagsSchema,
    uploadPhotoSchema,
} from './schemas/photo.schema.js';

type IdParams = { id: number };

export async function photoRoutes(app: FastifyInstance, { services }: RouteOptions) {
    const photoController = new PhotoController(
        services.photos,
        services.tags,
        services.search,
        services.transformations
    );

    // protected
    app.register(async function protectedPhotoRoutes(app) {
        app.register(authContext, { auth: services.auth });

        // search photos (optional query string)
        app.get<{ Querystring: PhotoSearchParams }>('/photos',
            { schema: searchPhotosSchema },
            photoController.searchPhotos.bind(photoController)
        );

        // upload photo (multipart)
        app.post('/photos',
            { schema: uploadPhotoSchema },
            photoController.upload.bind(photoController)
        );

        app.get<{ Params: IdParams }>('/photos/:id',
            { schema: getPhotoSchema },
            photoController.getById.bind(photoController)
        );

        app.patch<{ Params: IdParams; Body: { description: string | null } }>(
            '/photos/:id/description',
            { schema: updateDescriptionSchema },
            photoController.updateDescription.bind(photoController)
        );

        // add + remove tags in one request
        app.patch<{ Params: IdParams; Body: { tags_to_insert?: string[]; tags_to_remove?: string[] } }>(
            '/photos/:id/tags',
            { schema: updateTagsSchema },
            photoController.updateTags.bind(photoController)
        );

        app.post<{ Params: IdParams; Body: { tags: string[] } }>(
            '/photos/:id/tags',
            { schema: attachTagsSchema },
            photoController.attachTags.bind(photoController)
        );

        app.delete<{ Params: IdParams }>('/photos/:id',
            { schema: deletePhotoSchema },
            photoController.delete.bind(photoController)
        );

        // transformations + qr codes
        app.post<{ Params: IdParams; Body: TransformationRequest }>('/photos/:id/transform',
            { schema: transformPhotoSchema },
            photoController.transform.bind(photoController)
        );

        app.get<{ Params: IdParams }>('/photos/:id/transformations',
            { schema: listTransformationsSchema },
            photoController.listTransformations.bind(photoController)
        );

        app.get<{ Params: IdParams }>('/photos/:id/qr',
            { schema: photoQrSchema },
            photoController.qrCode.bind(photoController)
        );
    });
}
