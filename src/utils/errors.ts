/**========================================================================
 **                          APPLICATION ERRORS
 *? thrown by models/services/controllers, mapped to a status by the
 *? error handler in plugins/reply.error.ts
 *========================================================================**/

export class AppError extends Error {
    constructor(message: string, public readonly statusCode: number) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

// decode failures from the image library surface as this
export class InvalidImageError extends AppError {
    constructor(message = 'Uploaded file is not a readable image') {
        super(message, 400);
    }
}

// deliberately vague: doesn't say whether the username exists
export class InvalidCredentialsError extends AppError {
    constructor() {
        super('Invalid credentials', 401);
    }
}

export class AuthenticationRequiredError extends AppError {
    constructor() {
        super('Login required', 401);
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string) {
        super(message, 403);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404);
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 409);
    }
}
