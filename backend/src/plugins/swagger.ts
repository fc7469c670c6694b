import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';

export default fp(async function configSwagger(app: FastifyInstance) {
    // Generates the OpenAPI document from route schemas
    await app.register(swagger, {
        openapi: {
            info: {
                title: 'PhotoShare API',
                description: 'Photo sharing with tags, comments, ratings and transformations',
                version: '1.0.0',
            },
            components: {
                securitySchemes: {
                    // access token from POST /auth/login
                    bearerAuth: {
                        type: 'http',
                        scheme: 'bearer',
                        bearerFormat: 'JWT',
                    },
                },
            },
            security: [{ bearerAuth: [] }],
        },
    });

    // Serves the Swagger UI
    await app.register(swaggerUI, {
        routePrefix: '/docs',
        staticCSP: true,
        uiConfig: {
            docExpansion: 'list',
            deepLinking: true,
        },
    });
});
