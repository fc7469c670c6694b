import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest, FastifyServerOptions } from 'fastify';
import defaultConfig from './config.js';
import type { AppConfig } from './config.js';
import connectDb from './plugins/pool.js';
import connectRedis from './plugins/redis.js';
import configUploads from './plugins/uploads.js';
import setErrorReply from './plugins/reply.error.js';
import configSwagger from './plugins/swagger.js';
import { authRoutes } from './routes/auth.routes.js';
import { userRoutes } from './routes/user.routes.js';
import { photoRoutes } from './routes/photo.routes.js';
import { commentRoutes } from './routes/comment.routes.js';
import { ratingRoutes } from './routes/rating.routes.js';
import type { Repositories } from './types/repositories.js';
import type { Services } from './types/services.js';
import { createPgRepositories } from './models/index.js';
import { AuthService } from './services/auth.service.js';
import { UserService } from './services/user.service.js';
import { PhotoService } from './services/photo.service.js';
import { TagService } from './services/tag.service.js';
import { SearchService } from './services/search.service.js';
import { RatingService } from './services/rating.service.js';
import { CommentService } from './services/comment.service.js';
import { TransformationService } from './services/transformation.service.js';
import { CloudinaryStorage } from './services/image.storage.js';
import type { ImageStorage } from './services/image.storage.js';
import { MemoryTokenBlacklist, RedisTokenBlacklist } from './services/token.blacklist.js';
import type { TokenBlacklist } from './services/token.blacklist.js';

// replace infrastructure with in-process stand-ins (used by the test suite)
export type AppOverrides = {
    config?: Partial<AppConfig>;
    repositories?: Repositories;
    blacklist?: TokenBlacklist;
    storage?: ImageStorage;
};

/**========================================================================
 **                           BUILD APP
 *? creates an instance of the app with routes & plugins registered
 *? separate from server logic to enable component testing
 *@param options: fastify options object; default = empty
 *@param overrides: config values and stand-ins for postgres/redis/cloudinary
 *@return app: fastify instance
 *========================================================================**/

export async function buildApp(
    options: FastifyServerOptions = {},
    overrides: AppOverrides = {}
): Promise<FastifyInstance> {
    const config: AppConfig = { ...defaultConfig, ...overrides.config };
    const app = Fastify(options);

    // register error replies + handler before any route
    await app.register(setErrorReply);

    // connect to postgres db unless repositories are supplied
    let repositories = overrides.repositories;
    if (!repositories) {
        await app.register(connectDb, { connectionString: config.DATABASE_URL });
        repositories = createPgRepositories(app.db);
    }

    // revoked tokens: redis when configured, process memory otherwise
    let blacklist = overrides.blacklist;
    if (!blacklist) {
        if (config.REDIS_URL) {
            await app.register(connectRedis, { url: config.REDIS_URL });
            blacklist = new RedisTokenBlacklist(app.redis);
        } else {
            app.log.warn('REDIS_URL is not set; revoked tokens are kept in memory');
            blacklist = new MemoryTokenBlacklist();
        }
    }

    const storage = overrides.storage ?? new CloudinaryStorage({
        cloudName: config.CLOUDINARY_CLOUD_NAME,
        apiKey: config.CLOUDINARY_API_KEY,
        apiSecret: config.CLOUDINARY_API_SECRET,
        folder: config.CLOUDINARY_FOLDER,
    });

    // handle file uploads
    await app.register(configUploads);

    // register swagger
    await app.register(configSwagger);

    // init shared services
    const { users, photos, tags, comments, ratings, transformations } = repositories;

    const services: Services = {
        auth: new AuthService(users, blacklist, {
            secret: config.JWT_SECRET,
            accessTtlMinutes: config.ACCESS_TOKEN_TTL_MINUTES,
            refreshTtlDays: config.REFRESH_TOKEN_TTL_DAYS,
            bcryptRounds: config.BCRYPT_ROUNDS,
        }),
        users: new UserService(users, photos),
        photos: new PhotoService(photos, storage, app.log),
        tags: new TagService(photos, tags),
        search: new SearchService(photos, users),
        ratings: new RatingService(photos, ratings),
        comments: new CommentService(photos, comments),
        transformations: new TransformationService(photos, transformations, storage),
    };

    // define application routes
    app.register(authRoutes, { services });
    app.register(userRoutes, { services });
    app.register(photoRoutes, { services });
    app.register(commentRoutes, { services });
    app.register(ratingRoutes, { services });

    app.get('/', { schema: { hide: true } }, function (request: FastifyRequest, reply: FastifyReply) {
        reply.send({ name: 'photoshare', docs: '/docs' });
    });

    return app;
}
