import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { SESSION_COOKIE } from './session.js';

export default fp(async function configSwagger(app: FastifyInstance) {
    // Generates the OpenAPI document from route schemas
    await app.register(swagger, {
        openapi: {
            info: {
                title: 'LensLoft API',
                description: 'Photo sharing: feed, profiles, creator uploads, likes, saves and comments',
                version: '1.0.0',
            },
            servers: [{ url: `http://localhost:${app.config.port}` }],
            tags: [
                { name: 'Users', description: 'Registration, login and profiles' },
                { name: 'Photos', description: 'Feed, creator uploads, likes and saves' },
                { name: 'Comments', description: 'Moderated comments' },
            ],
            components: {
                securitySchemes: {
                    // set by POST /login
                    sessionCookie: {
                        type: 'apiKey',
                        name: SESSION_COOKIE,
                        in: 'cookie',
                    },
                },
            },
            security: [{ sessionCookie: [] }],
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
