// photo_id in the url: coerced to an integer by fastify
export const photoIdParamSchema = {
    params: {
        type: 'object',
        properties: {
            photo_id: {
                type: 'integer',
                minimum: 1,
                description: 'Photo ID',
            },
        },
        required: ['photo_id'],
        additionalProperties: false,
    },
};

const nullableString = { type: ['string', 'null'] };

export const photoPayloadSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        user_id: { type: 'integer' },
        username: { type: 'string' },
        file_url: { type: 'string', description: 'Blob URL or /static/uploads/ path' },
        title: { type: 'string' },
        caption: nullableString,
        location: nullableString,
        people_present: nullableString,
        auto_tags: { ...nullableString, description: 'e.g. "HD | Bright | Warm"' },
        uploaded_at: { type: 'string', format: 'date-time' },
        like_count: { type: 'integer' },
        comment_count: { type: 'integer' },
    },
    required: ['id', 'user_id', 'username', 'file_url', 'title', 'uploaded_at'],
    additionalProperties: false,
};

const photoListSchema = { type: 'array', items: photoPayloadSchema };

/**============================================
 *                 GET /feed
 *=============================================**/
export const feedSchema = {
    tags: ['Photos'],
    summary: 'List photos, newest first, or search them',
    description: 'With `q`, returns photos whose title, caption or owner username contains the term (case-insensitive).',
    querystring: {
        type: 'object',
        properties: {
            q: { type: 'string', maxLength: 100 },
        },
    },
    response: {
        200: {
            type: 'object',
            properties: {
                q: nullableString,
                photos: photoListSchema,
            },
            required: ['photos'],
            additionalProperties: false,
        },
    },
};

/**============================================
 *                 GET /upload
 *=============================================**/
export const dashboardSchema = {
    tags: ['Photos'],
    summary: 'Creator dashboard',
    description: 'Creators only. Returns the creator and their uploads.',
    response: {
        200: {
            type: 'object',
            properties: {
                user: { type: 'object', additionalProperties: true },
                photos: photoListSchema,
            },
            required: ['user', 'photos'],
            additionalProperties: false,
        },
    },
};

/**============================================
 *                POST /upload
 *=============================================**/
// body documented only: multipart is read by the controller, not validated by ajv
export const uploadPhotoSchema = {
    tags: ['Photos'],
    summary: 'Upload a photo',
    description: 'Creators only. multipart/form-data with `photo` (file), `title` (required), `caption`, `location`, `people`.',
    consumes: ['multipart/form-data'],
    response: {
        201: {
            type: 'object',
            properties: {
                photo: photoPayloadSchema,
            },
            required: ['photo'],
            additionalProperties: false,
        },
    },
};

/**============================================
 *       POST /like/:photo_id, /save/:photo_id
 *=============================================**/
export const likeSchema = {
    tags: ['Photos'],
    summary: 'Toggle like',
    ...photoIdParamSchema,
    response: {
        200: {
            type: 'object',
            properties: { liked: { type: 'boolean' } },
            required: ['liked'],
            additionalProperties: false,
        },
    },
};

export const saveSchema = {
    tags: ['Photos'],
    summary: 'Toggle save',
    ...photoIdParamSchema,
    response: {
        200: {
            type: 'object',
            properties: { saved: { type: 'boolean' } },
            required: ['saved'],
            additionalProperties: false,
        },
    },
};

/**============================================
 *            POST /comment/:photo_id
 *=============================================**/
// `text` is checked by the moderator so a missing value gets its own reply
export const commentSchema = {
    tags: ['Comments'],
    summary: 'Add a comment',
    description: 'Body `{ text }`. Empty text -> 400 "Missing comment text"; very negative text -> 422 "Negative blocked".',
    ...photoIdParamSchema,
};

/**============================================
 *        GET /photos/:photo_id/comments
 *=============================================**/
export const listCommentsSchema = {
    tags: ['Comments'],
    summary: 'List comments on a photo, oldest first',
    ...photoIdParamSchema,
    response: {
        200: {
            type: 'object',
            properties: {
                comments: {
                    type: 'array',
                    items: {
                        type: 'object',
                        properties: {
                            id: { type: 'integer' },
                            text: { type: 'string' },
                            user_id: { type: 'integer' },
                            username: { type: 'string' },
                            photo_id: { type: 'integer' },
                            created_at: { type: 'string', format: 'date-time' },
                        },
                        required: ['id', 'text', 'user_id', 'username', 'photo_id', 'created_at'],
                        additionalProperties: false,
                    },
                },
            },
            required: ['comments'],
            additionalProperties: false,
        },
    },
};
