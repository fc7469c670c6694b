import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { isAppError } from '@/utils/errors.js';

type ClientError = {
    statusCode: number;
    message: string;
    code?: string;
};

// errors raised by fastify or its plugins (bad multipart, payload too large, ...)
function isClientError(error: unknown): error is ClientError {
    return error instanceof Error
        && 'statusCode' in error
        && typeof error.statusCode === 'number'
        && error.statusCode >= 400
        && error.statusCode < 500;
}

/**========================================================================
 **                          ERROR REPLIES
 *? reply.sendError(err) maps any thrown value to
 *?   { success: false, error: <message>, code: <MACHINE_CODE> }
 *? unexpected errors are logged and reported as a generic 500
 *========================================================================**/

export default fp(async function setErrorReply(app: FastifyInstance) {
    app.decorateReply('sendError', function sendError(
        this: FastifyReply,
        error: unknown
    ) {
        if (isAppError(error)) {
            this.log.info({ code: error.code }, error.message);
            return this.status(error.statusCode).send({
                success: false,
                error: error.message,
                code: error.code
            });
        }

        if (isClientError(error)) {
            return this.status(error.statusCode).send({
                success: false,
                error: error.message,
                code: error.code ?? 'BAD_REQUEST'
            });
        }

        this.log.error({ err: error }, 'unhandled error');
        return this.status(500).send({
            success: false,
            error: 'Internal server error',
            code: 'INTERNAL_ERROR'
        });
    });

    // schema validation failures and anything thrown outside a controller
    app.setErrorHandler<FastifyError>(function handleError(error, request, reply) {
        if (error.validation) {
            return reply.status(400).send({
                success: false,
                error: error.message,
                code: 'VALIDATION_ERROR'
            });
        }
        return reply.sendError(error);
    });
});
