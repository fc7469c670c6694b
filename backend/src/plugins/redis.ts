import fp from 'fastify-plugin';
import redis from '@fastify/redis';
import type { FastifyInstance } from 'fastify';

type RedisPluginOptions = {
    url: string;
};

// revoked token ids live here until they expire
export default fp<RedisPluginOptions>(async function connectRedis(app: FastifyInstance, opts) {
    await app.register(redis, {
        url: opts.url,
        closeClient: true,
    });
});
