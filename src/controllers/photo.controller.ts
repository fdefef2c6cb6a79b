import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CommentModel } from '../models/comment.model.js';
import type { PhotoModel } from '../models/photo.model.js';
import type { RelationModel } from '../models/relation.model.js';
import { currentUser } from '../plugins/user.context.js';
import type { CommentModerator } from '../services/moderation.service.js';
import { type PhotoUploadService, readUploadForm } from '../services/photo.upload.js';
import { debugPrint } from '../utils/debug.print.js';
import { NotFoundError } from '../utils/errors.js';

const DEBUG_LEVELS = ['debug', 'trace'];

export interface FeedQuery {
    q?: string;
}

export interface PhotoParams {
    photo_id: number;
}

// form fields arrive untyped; the moderator checks `text`
export interface CommentBody {
    text?: unknown;
}

export class PhotoController {
    constructor(
        private photoModel: PhotoModel,
        private commentModel: CommentModel,
        private likes: RelationModel,
        private saves: RelationModel,
        private uploadService: PhotoUploadService,
        private moderator: CommentModerator
    ) {}

    private async ensurePhoto(photo_id: number): Promise<void> {
        if (!(await this.photoModel.exists(photo_id))) {
            throw new NotFoundError(`Photo ${photo_id} not found`);
        }
    }

    // GET /feed?q=
    // the term is matched as given, surrounding spaces included
    async feed(request: FastifyRequest<{ Querystring: FeedQuery }>, reply: FastifyReply) {
        const { q } = request.query;

        const photos = q
            ? await this.photoModel.search(q)
            : await this.photoModel.findAll();

        return reply.send({ q: q || null, photos });
    }

    // GET /upload
    async dashboard(request: FastifyRequest, reply: FastifyReply) {
        const user = currentUser(request);
        const photos = await this.photoModel.findByOwner(user.id);
        return reply.send({ user, photos });
    }

    // POST /upload
    // role was checked by the route's preHandler before the body is read
    async upload(request: FastifyRequest, reply: FastifyReply) {
        const user = currentUser(request);

        const form = await readUploadForm(request);
        const result = await this.uploadService.upload(user.id, form);

        if (DEBUG_LEVELS.includes(request.log.level)) {
            debugPrint({
                photo_id: result.photo.id,
                storage_name: result.storage_name,
                auto_tags: result.photo.auto_tags,
                original_size: result.original_size,
                stored_size: result.stored_size,
                file_url: result.photo.file_url,
            }, 'PhotoController.upload');
        }
        request.log.info({ photo_id: result.photo.id, user_id: user.id }, 'photo uploaded');

        return reply.status(201).send({ photo: result.photo });
    }

    // POST /like/:photo_id
    async like(request: FastifyRequest<{ Params: PhotoParams }>, reply: FastifyReply) {
        const user = currentUser(request);
        const { photo_id } = request.params;
        await this.ensurePhoto(photo_id);

        const liked = await this.likes.toggle(user.id, photo_id);
        return reply.send({ liked });
    }

    // POST /save/:photo_id
    async save(request: FastifyRequest<{ Params: PhotoParams }>, reply: FastifyReply) {
        const user = currentUser(request);
        const { photo_id } = request.params;
        await this.ensurePhoto(photo_id);

        const saved = await this.saves.toggle(user.id, photo_id);
        return reply.send({ saved });
    }

    // POST /comment/:photo_id
    // rejected text is dropped here: not stored, not logged
    async comment(
        request: FastifyRequest<{ Params: PhotoParams; Body: CommentBody | undefined }>,
        reply: FastifyReply
    ) {
        const user = currentUser(request);
        const { photo_id } = request.params;
        await this.ensurePhoto(photo_id);

        const text = request.body?.text;
        const result = this.moderator.moderate(typeof text === 'string' ? text : null);

        switch (result.status) {
            case 'missing':
                return reply.status(400).send({ success: false, message: result.message });
            case 'rejected':
                request.log.info({ photo_id, user_id: user.id }, 'comment blocked by moderation');
                return reply.status(422).send({ success: false, message: result.message });
            case 'admitted':
                await this.commentModel.create(user.id, photo_id, result.text);
                return reply.status(201).send({ success: true });
        }
    }

    // GET /photos/:photo_id/comments
    async comments(request: FastifyRequest<{ Params: PhotoParams }>, reply: FastifyReply) {
        const { photo_id } = request.params;
        await this.ensurePhoto(photo_id);

        const comments = await this.commentModel.findByPhoto(photo_id);
        return reply.send({ comments });
    }
}
