import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import fastifyMultipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import fs from 'fs';
import type { StorageConfig } from '../config.js';
import { LOCAL_UPLOADS_PREFIX } from '../services/blob.storage.js';

export interface UploadsPluginOptions {
    storage: StorageConfig;
}

export default fp<UploadsPluginOptions>(async function configUploads(app: FastifyInstance, { storage }) {
    await app.register(fastifyMultipart, {
        limits: {
            fieldNameSize: 100,
            fieldSize: 10000, // max 10kb per text field
            fields: 10,
            fileSize: 16 * 1024 * 1024, // max 16mb per photo
            files: 1,
            headerPairs: 2000,
            parts: 20
        }
    });

    // blobs in the cloud are served from their own URLs
    if (storage.kind !== 'local') return;

    fs.mkdirSync(storage.directory, { recursive: true });

    await app.register(fastifyStatic, {
        root: storage.directory, // specifies the directory to serve files from
        prefix: LOCAL_UPLOADS_PREFIX
    });
});
