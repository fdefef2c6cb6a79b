import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Role, User } from '../types/models.js';
import { AuthenticationRequiredError, ForbiddenError } from '../utils/errors.js';

// narrow request.user for handlers behind userContext
export function currentUser(request: FastifyRequest): User {
    if (!request.user) {
        throw new AuthenticationRequiredError();
    }
    return request.user;
}

// role gate for individual routes, runs before the body is consumed
export function requireRole(role: Role, message: string) {
    return async function checkRole(request: FastifyRequest) {
        if (currentUser(request).role !== role) {
            throw new ForbiddenError(message);
        }
    };
}

// reject requests without a logged-in user
export default fp(async function userContext(app: FastifyInstance) {
    app.addHook('preHandler', async (request: FastifyRequest) => {
        currentUser(request);
    });
});
