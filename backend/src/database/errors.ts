const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

type PgErrorFields = {
    code: string;
    constraint?: string;
};

function isPgError(err: unknown): err is PgErrorFields {
    return typeof err === 'object'
        && err !== null
        && 'code' in err
        && typeof err.code === 'string';
}

// unique constraint hit; optionally only for the named constraint
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
    if (!isPgError(err) || err.code !== UNIQUE_VIOLATION) return false;
    return constraint === undefined || err.constraint === constraint;
}

export function isForeignKeyViolation(err: unknown): boolean {
    return isPgError(err) && err.code === FOREIGN_KEY_VIOLATION;
}
