import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import fastifyFormbody from '@fastify/formbody';
import type { AppConfig } from './config.js';
import connectDatabase from './plugins/database.js';
import configSession from './plugins/session.js';
import configUploads from './plugins/uploads.js';
import setErrorReply from './plugins/reply.error.js';
import configSwagger from './plugins/swagger.js';
import { userRoutes } from './routes/user.routes.js';
import { photoRoutes } from './routes/photo.routes.js';
import { type BlobSink, createBlobSink } from './services/blob.storage.js';
import { CommentModerator } from './services/moderation.service.js';
import type { Services } from './types/services.js';

// swap collaborators without touching config (tests use in-memory sinks)
export interface AppOverrides {
    blobSink?: BlobSink;
    moderator?: CommentModerator;
    clock?: () => Date;
}

/**========================================================================
 **                           BUILD APP
 *? creates an instance of the app with routes & plugins registered
 *? separate from server logic to enable component testing
 *@param config: resolved once by loadConfig()
 *@param options: fastify options object; default = empty
 *@param overrides: replacement services
 *@return app: fastify instance
 *========================================================================**/

export async function buildApp(
    config: AppConfig,
    options: FastifyServerOptions = {},
    overrides: AppOverrides = {}
): Promise<FastifyInstance> {
    const app = Fastify(options);
    app.decorate('config', config);

    // open the configured database and create tables
    await app.register(connectDatabase, { database: config.database });

    // register error handler for requests
    await app.register(setErrorReply);

    // signed session cookie -> request.user
    await app.register(configSession, { secret: config.secretKey });

    // urlencoded form posts (register, login, comment)
    await app.register(fastifyFormbody);

    // handle file uploads + serve local blobs
    await app.register(configUploads, { storage: config.storage });

    // register swagger
    await app.register(configSwagger);

    // init shared services
    const services: Services = {
        blobSink: overrides.blobSink ?? createBlobSink(config.storage),
        moderator: overrides.moderator ?? new CommentModerator(undefined, app.log),
        clock: overrides.clock ?? (() => new Date()),
    };

    // define application routes
    await app.register(userRoutes);
    await app.register(photoRoutes, services);

    return app;
}
