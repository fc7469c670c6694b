import config, { DEFAULT_JWT_SECRET } from './config.js';
import { buildApp } from './app.js';

const server = await buildApp({
    logger: {
        level: config.LOG_LEVEL,
        transport: {
            target: 'pino-pretty'
        }
    }
});

if (config.JWT_SECRET === DEFAULT_JWT_SECRET) {
    server.log.warn('JWT_SECRET is not set; tokens are signed with the default secret');
}
if (!config.CLOUDINARY_CLOUD_NAME) {
    server.log.warn('CLOUDINARY_CLOUD_NAME is not set; photo uploads will fail');
}

// close the pool + redis client before exiting
async function shutdown(signal: string) {
    server.log.info(`${signal} received, shutting down`);
    try {
        await server.close();
        process.exit(0);
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

// start server
const start = async () => {
    try {
        await server.listen({ port: config.PORT, host: config.HOST });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

await start();
