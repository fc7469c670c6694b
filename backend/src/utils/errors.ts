/**========================================================================
 **                          APPLICATION ERRORS
 *? every error a service throws on purpose carries an http status
 *? and a machine-readable code; anything else is reported as a 500
 *========================================================================**/

export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

// malformed input: score out of range, too many tags, bad upload
export class ValidationError extends AppError {
    constructor(code: string, message: string) {
        super(400, code, message);
    }
}

// missing, invalid, expired or revoked token
export class AuthError extends AppError {
    constructor(code: string, message = 'Could not validate credentials') {
        super(401, code, message);
    }
}

// role, ownership or ban violation
export class ForbiddenError extends AppError {
    constructor(code = 'FORBIDDEN', message = 'Not enough permissions') {
        super(403, code, message);
    }
}

export class NotFoundError extends AppError {
    constructor(code: string, resource: string) {
        super(404, code, `${resource} not found`);
    }
}

// duplicate rating, username or email
export class ConflictError extends AppError {
    constructor(code: string, message: string) {
        super(409, code, message);
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}
