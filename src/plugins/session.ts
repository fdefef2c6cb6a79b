import fp from 'fastify-plugin';
import fastifyCookie from '@fastify/cookie';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { UserModel } from '../models/user.model.js';
import type { User } from '../types/models.js';

export const SESSION_COOKIE = 'session';

export interface SessionPluginOptions {
    secret: string;
}

// signed cookie carries the user id; the user is reloaded on every request
export default fp<SessionPluginOptions>(async function configSession(app: FastifyInstance, { secret }) {
    await app.register(fastifyCookie, { secret });

    const userModel = new UserModel(app.db);
    app.decorateRequest('user', null);

    app.addHook('onRequest', async (request: FastifyRequest) => {
        const raw = request.cookies[SESSION_COOKIE];
        if (!raw) return;

        const { valid, value } = request.unsignCookie(raw);
        if (!valid || value === null || !/^\d+$/.test(value)) return;

        request.user = await userModel.findById(Number(value));
    });
});

export function startSession(reply: FastifyReply, user: User): void {
    reply.setCookie(SESSION_COOKIE, String(user.id), {
        signed: true,
        httpOnly: true,
        sameSite: 'lax',
        path: '/',
    });
}

export function endSession(reply: FastifyReply): void {
    reply.clearCookie(SESSION_COOKIE, { path: '/' });
}
