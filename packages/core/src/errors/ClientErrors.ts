/**
 * @fileoverview Client errors
 *
 * One class per failure cause so callers can branch on kind, e.g. treat
 * {@link ObjectNotFoundError} as "safe to create" but a
 * {@link RowCountMismatchError} as "retry the whole fetch later".
 *
 * @module @confrest/core/errors/ClientErrors
 */

import { ERROR_CODES } from "./codes.js";
import { ClientError } from "./ConfRestError.js";

/** None of ref, id or name is set on the object. */
export class MissingIdentifiersError extends ClientError {
    constructor(typeName: string) {
        super(
            ERROR_CODES.MISSING_IDENTIFIERS,
            `No ref, id or name set on ${typeName}`,
            { typeName }
        );
    }
}

/** The entity type only exists embedded in other objects. */
export class NoConfigPathError extends ClientError {
    constructor(typeName: string) {
        super(
            ERROR_CODES.NO_CONFIG_PATH,
            `${typeName} has no config path and cannot be addressed directly`,
            { typeName }
        );
    }
}

/** A ref did not start with `/rest/config/`. */
export class InvalidRefError extends ClientError {
    constructor(public readonly ref: string) {
        super(ERROR_CODES.INVALID_REF, `Invalid ref: ${ref}`, { ref });
    }
}

/** A required connection argument was not supplied. */
export class MissingArgumentError extends ClientError {
    constructor(public readonly argument: string) {
        super(ERROR_CODES.MISSING_ARGUMENT, `Missing argument: ${argument}`, { argument });
    }
}

/** The server answered but did not contain the requested object. */
export class ObjectNotFoundError extends ClientError {
    constructor(typeName: string, lookup: string) {
        super(
            ERROR_CODES.OBJECT_NOT_FOUND,
            `${typeName} not found: ${lookup}`,
            { typeName, lookup }
        );
    }
}

/** A field the protocol requires was absent from the response. */
export class FieldNotFoundError extends ClientError {
    constructor(public readonly field: string) {
        super(ERROR_CODES.FIELD_NOT_FOUND, `Field not found in response: ${field}`, { field });
    }
}

/** A lookup by key returned no object to take the id from. */
export class IdNotFoundError extends ClientError {
    constructor(typeName: string, key: string, value: string) {
        super(
            ERROR_CODES.ID_NOT_FOUND,
            `No ${typeName} id found for ${key}=${value}`,
            { typeName, key, value }
        );
    }
}

/** The id returned by the server was not an unsigned integer. */
export class IdParseError extends ClientError {
    constructor(value: unknown) {
        super(ERROR_CODES.ID_PARSE_ERROR, `Unable to parse id: ${String(value)}`, { value });
    }
}

/** A field expected to hold a list held something else. */
export class NotAnArrayError extends ClientError {
    constructor(field: string) {
        super(ERROR_CODES.NOT_AN_ARRAY, `Expected an array in ${field}`, { field });
    }
}

/** A value could not be decoded into the expected type. */
export class TypeParseError extends ClientError {
    constructor(expected: string, reason: string, cause?: unknown) {
        super(
            ERROR_CODES.TYPE_PARSE_ERROR,
            `Unable to parse ${expected}: ${reason}`,
            { expected, reason },
            cause
        );
    }
}

/**
 * The server-declared row count changed between pages, or the accumulated
 * collection size disagrees with it.
 */
export class RowCountMismatchError extends ClientError {
    constructor(
        public readonly previous: number,
        public readonly current: number
    ) {
        super(
            ERROR_CODES.ROW_COUNT_MISMATCH,
            `Row count mismatch: expected ${previous}, got ${current}`,
            { previous, current }
        );
    }
}

/** Two deserialized elements computed the same unique name. */
export class DuplicateKeyError extends ClientError {
    constructor(public readonly key: string) {
        super(ERROR_CODES.DUPLICATE_KEY, `Duplicate key: ${key}`, { key });
    }
}

/** HTTP 401, or a login that returned no token. */
export class UnauthorizedError extends ClientError {
    constructor(message = "Unauthorized access") {
        super(ERROR_CODES.UNAUTHORIZED, message, { status: 401 });
    }
}

/** HTTP 404. */
export class ResourceNotFoundError extends ClientError {
    constructor(path: string) {
        super(ERROR_CODES.RESOURCE_NOT_FOUND, `Resource not found: ${path}`, { status: 404, path });
    }
}

/** HTTP 400. */
export class BadRequestError extends ClientError {
    constructor(message = "Bad request") {
        super(ERROR_CODES.BAD_REQUEST, message, { status: 400 });
    }
}

/** HTTP 500. */
export class InternalServerError extends ClientError {
    constructor(path: string) {
        super(ERROR_CODES.INTERNAL_SERVER_ERROR, `Internal server error: ${path}`, { status: 500, path });
    }
}

/** Any other non-200 status. */
export class UndefinedHttpError extends ClientError {
    constructor(
        public readonly status: number,
        message = "Unknown error"
    ) {
        super(ERROR_CODES.UNDEFINED_HTTP_ERROR, message, { status });
    }
}

/** The request never produced a response (network, TLS, timeout, cancellation). */
export class HttpError extends ClientError {
    constructor(message: string, cause?: unknown) {
        super(ERROR_CODES.HTTP_ERROR, message, {}, cause);
    }
}
