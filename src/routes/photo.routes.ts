import type { FastifyInstance } from 'fastify';
import { PhotoModel } from '../models/photo.model.js';
import { CommentModel } from '../models/comment.model.js';
import { RelationModel } from '../models/relation.model.js';
import {
    type CommentBody,
    type FeedQuery,
    type PhotoParams,
    PhotoController,
} from '../controllers/photo.controller.js';
import userContext, { requireRole } from '../plugins/user.context.js';
import { PhotoUploadService } from '../services/photo.upload.js';
import type { Services } from '../types/services.js';
import {
    commentSchema,
    dashboardSchema,
    feedSchema,
    likeSchema,
    listCommentsSchema,
    saveSchema,
    uploadPhotoSchema,
} from './schemas/photo.schema.js';

/* feed queries
    /feed         -> every photo, newest first
    /feed?q=beach -> title, caption or owner username contains "beach"
 */
export async function photoRoutes(app: FastifyInstance, services: Services) {
    const { blobSink, moderator, clock } = services;

    const photoModel = new PhotoModel(app.db);
    const photoController = new PhotoController(
        photoModel,
        new CommentModel(app.db),
        new RelationModel(app.db, 'likes'),
        new RelationModel(app.db, 'saves'),
        new PhotoUploadService(photoModel, blobSink, clock),
        moderator
    );

    // protected
    app.register(async function protectedPhotoRoutes(app) {
        app.register(userContext);

        const creatorsOnly = requireRole('creator', 'Only creators allowed');

        // browse / search
        app.get<{ Querystring: FeedQuery }>(
            '/feed',
            { schema: feedSchema },
            photoController.feed.bind(photoController)
        );

        // creator dashboard + upload
        app.get('/upload',
            { schema: dashboardSchema, preHandler: creatorsOnly },
            photoController.dashboard.bind(photoController)
        );

        app.post('/upload',
            { schema: uploadPhotoSchema, preHandler: creatorsOnly },
            photoController.upload.bind(photoController)
        );

        // toggles
        app.post<{ Params: PhotoParams }>(
            '/like/:photo_id',
            { schema: likeSchema },
            photoController.like.bind(photoController)
        );

        app.post<{ Params: PhotoParams }>(
            '/save/:photo_id',
            { schema: saveSchema },
            photoController.save.bind(photoController)
        );

        // comments
        app.post<{ Params: PhotoParams; Body: CommentBody | undefined }>(
            '/comment/:photo_id',
            { schema: commentSchema },
            photoController.comment.bind(photoController)
        );

        app.get<{ Params: PhotoParams }>(
            '/photos/:photo_id/comments',
            { schema: listCommentsSchema },
            photoController.comments.bind(photoController)
        );
    });
}
