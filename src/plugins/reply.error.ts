import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../utils/errors.js';

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// default error responses: { success: false, error }
export default fp(async function setErrorReply(app: FastifyInstance) {
    app.decorateReply('sendError', function sendError(
        this: FastifyReply,
        error: unknown,
        status?: number
    ) {
        const statusCode = status ?? (error instanceof AppError ? error.statusCode : 400);
        return this.status(statusCode).send({
            success: false,
            error: messageOf(error),
        });
    });

    app.setErrorHandler(function handleError(
        error: FastifyError,
        request: FastifyRequest,
        reply: FastifyReply
    ) {
        // route schema rejected the request
        if (error.validation) {
            return reply.sendError(error.message, 400);
        }
        if (error instanceof AppError) {
            return reply.sendError(error);
        }
        // body too large, bad multipart, unsupported media type...
        if (error.statusCode !== undefined && error.statusCode < 500) {
            return reply.sendError(error.message, error.statusCode);
        }

        request.log.error({ err: error }, 'Unhandled error');
        return reply.sendError('Internal Server Error', 500);
    });
});
