import fs from 'fs/promises';
import path from 'path';
import { BlobServiceClient, type ContainerClient } from '@azure/storage-blob';
import type { StorageConfig } from '../config.js';

/**========================================================================
 **                             BLOB SINKS
 *? "write named bytes, get back a URL the browser can load"
 *? the upload pipeline only sees this interface
 *========================================================================**/

export interface BlobSink {
    write(name: string, bytes: Buffer, contentType: string): Promise<string>;
}

// files served by @fastify/static, see plugins/uploads.ts
export const LOCAL_UPLOADS_PREFIX = '/static/uploads/';

export class LocalBlobSink implements BlobSink {
    constructor(private directory: string) {}

    async write(name: string, bytes: Buffer, _contentType: string): Promise<string> {
        await fs.mkdir(this.directory, { recursive: true });
        await fs.writeFile(path.join(this.directory, name), bytes);
        return `${LOCAL_UPLOADS_PREFIX}${encodeURIComponent(name)}`;
    }
}

export class AzureBlobSink implements BlobSink {
    constructor(private container: ContainerClient) {}

    static fromConnectionString(connectionString: string, container: string): AzureBlobSink {
        const service = BlobServiceClient.fromConnectionString(connectionString);
        return new AzureBlobSink(service.getContainerClient(container));
    }

    // uploadData replaces an existing blob with the same name
    async write(name: string, bytes: Buffer, contentType: string): Promise<string> {
        const blob = this.container.getBlockBlobClient(name);
        await blob.uploadData(bytes, {
            blobHTTPHeaders: { blobContentType: contentType },
        });
        return blob.url;
    }
}

export function createBlobSink(storage: StorageConfig): BlobSink {
    switch (storage.kind) {
        case 'azure':
            return AzureBlobSink.fromConnectionString(storage.connectionString, storage.container);
        case 'local':
            return new LocalBlobSink(storage.directory);
    }
}
