import type { BlobSink } from '../services/blob.storage.js';
import type { CommentModerator } from '../services/moderation.service.js';

// shared collaborators built once in app.ts and handed to route plugins
export interface Services {
    blobSink: BlobSink;
    moderator: CommentModerator;
    clock: () => Date;
}
