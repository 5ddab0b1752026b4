/**
 * Store Errors
 *
 * Constraint violations reported by Postgres are translated into distinct,
 * catchable error classes so callers never have to inspect SQLSTATE codes.
 */

export type StoreErrorCode =
    | 'UNIQUE_VIOLATION'
    | 'FOREIGN_KEY_VIOLATION'
    | 'NOT_FOUND'
    | 'PLAN_LIMIT_EXCEEDED';

export class StoreError extends Error {
    code: StoreErrorCode;
    details?: Record<string, unknown>;

    constructor(message: string, code: StoreErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreError';
        this.code = code;
        this.details = details;
    }
}

export class UniqueConstraintViolation extends StoreError {
    constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 'UNIQUE_VIOLATION', details, options);
        this.name = 'UniqueConstraintViolation';
    }
}

export class ForeignKeyViolation extends StoreError {
    constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 'FOREIGN_KEY_VIOLATION', details, options);
        this.name = 'ForeignKeyViolation';
    }
}

export type EntityName = 'user' | 'plan' | 'account';

export class NotFound extends StoreError {
    entity: EntityName;

    constructor(entity: EntityName, id: number | string) {
        super(`${entity} ${id} not found`, 'NOT_FOUND', { entity, id });
        this.name = 'NotFound';
        this.entity = entity;
    }
}

export class PlanLimitExceeded extends StoreError {
    constructor(userId: number, limit: number, planName: string) {
        super(
            `User ${userId} already has ${limit} linked account(s), the limit of plan ${planName}`,
            'PLAN_LIMIT_EXCEEDED',
            { userId, limit, planName }
        );
        this.name = 'PlanLimitExceeded';
    }
}

// =============================================================================
// Postgres error translation
// =============================================================================

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

export interface PgErrorFields {
    code: string;
    constraint?: string;
    table?: string;
    detail?: string;
}

function readOptionalString(value: object, key: 'constraint' | 'table' | 'detail'): string | undefined {
    if (!(key in value)) return undefined;
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
}

/**
 * Find the Postgres error on a cause chain. Drizzle wraps driver errors
 * (DrizzleQueryError) so the SQLSTATE usually sits one level down.
 */
export function findPgError(err: unknown): PgErrorFields | undefined {
    let current: unknown = err;

    for (let depth = 0; depth < 5; depth++) {
        if (typeof current !== 'object' || current === null) {
            return undefined;
        }
        if ('code' in current && typeof current.code === 'string' && /^[0-9A-Z]{5}$/.test(current.code)) {
            return {
                code: current.code,
                constraint: readOptionalString(current, 'constraint'),
                table: readOptionalString(current, 'table'),
                detail: readOptionalString(current, 'detail'),
            };
        }
        current = 'cause' in current ? current.cause : undefined;
    }

    return undefined;
}

/**
 * Map a driver error to a StoreError. Errors that are not constraint
 * violations are returned unchanged.
 */
export function translateDatabaseError(err: unknown): unknown {
    if (err instanceof StoreError) {
        return err;
    }

    const pgError = findPgError(err);
    if (!pgError) {
        return err;
    }

    const details = {
        constraint: pgError.constraint,
        table: pgError.table,
        detail: pgError.detail,
    };

    if (pgError.code === PG_UNIQUE_VIOLATION) {
        return new UniqueConstraintViolation(
            pgError.detail ?? `Unique constraint ${pgError.constraint ?? 'unknown'} violated`,
            details,
            { cause: err }
        );
    }

    if (pgError.code === PG_FOREIGN_KEY_VIOLATION) {
        return new ForeignKeyViolation(
            pgError.detail ?? `Foreign key ${pgError.constraint ?? 'unknown'} violated`,
            details,
            { cause: err }
        );
    }

    return err;
}
