import { ROLES } from '../../types/models.js';

const userSchema = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        username: { type: 'string' },
        role: { type: 'string', enum: ROLES },
        created_at: { type: 'string', format: 'date-time' },
    },
    required: ['id', 'username', 'role'],
    additionalProperties: false,
};

const errorSchema = {
    type: 'object',
    properties: {
        success: { type: 'boolean' },
        error: { type: 'string' },
    },
    required: ['success', 'error'],
    additionalProperties: true,
};

const credentialsProperties = {
    username: {
        type: 'string',
        minLength: 1,
        maxLength: 80,
        pattern: '^[A-Za-z0-9_.-]+$',
    },
    password: { type: 'string', minLength: 1, maxLength: 200 },
};

export const registerSchema = {
    tags: ['Users'],
    summary: 'Register',
    description: 'Creates a user. `role` defaults to consumer; only creators can upload.',
    security: [],
    body: {
        type: 'object',
        properties: {
            ...credentialsProperties,
            role: { type: 'string', enum: ROLES, default: 'consumer' },
        },
        required: ['username', 'password'],
        additionalProperties: false,
    },
    response: {
        201: {
            type: 'object',
            properties: { user: userSchema },
            required: ['user'],
            additionalProperties: false,
        },
        400: errorSchema,
        409: errorSchema,
    },
};

export const registerFormSchema = {
    tags: ['Users'],
    summary: 'Registration options',
    security: [],
    response: {
        200: {
            type: 'object',
            properties: {
                roles: { type: 'array', items: { type: 'string' } },
                default_role: { type: 'string' },
            },
            required: ['roles', 'default_role'],
            additionalProperties: false,
        },
    },
};

export const loginSchema = {
    tags: ['Users'],
    summary: 'Log in',
    description: 'Sets the signed `session` cookie.',
    security: [],
    body: {
        type: 'object',
        properties: credentialsProperties,
        required: ['username', 'password'],
        additionalProperties: false,
    },
    response: {
        200: {
            type: 'object',
            properties: { user: userSchema },
            required: ['user'],
            additionalProperties: false,
        },
        401: errorSchema,
    },
};

export const sessionSchema = {
    tags: ['Users'],
    summary: 'Current session',
    response: {
        200: {
            type: 'object',
            properties: {
                authenticated: { type: 'boolean' },
                user: { anyOf: [userSchema, { type: 'null' }] },
            },
            required: ['authenticated', 'user'],
            additionalProperties: false,
        },
    },
};

export const profileSchema = {
    tags: ['Users'],
    summary: 'User profile',
    description: 'The user\'s own photos, the photos they saved and the photos they liked.',
    params: {
        type: 'object',
        properties: {
            username: { type: 'string', minLength: 1, maxLength: 80 },
        },
        required: ['username'],
    },
};
