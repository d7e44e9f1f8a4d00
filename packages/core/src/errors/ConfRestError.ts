/**
 * @fileoverview Base error types
 *
 * Every error raised by the framework extends {@link ConfRestError} and
 * carries a code from {@link ERROR_CODES}. Two families sit below it:
 * {@link ClientError} for request, response and consistency failures and
 * {@link ConfigError} for builder and field validation failures.
 *
 * @module @confrest/core/errors/ConfRestError
 */

import type { ErrorCode } from "./codes.js";

/**
 * Base error carrying a machine code and structured details.
 */
export class ConfRestError extends Error {
    /** Machine readable error code */
    public readonly code: ErrorCode;

    /** Structured context for diagnostics */
    public readonly details: Readonly<Record<string, unknown>>;

    constructor(
        code: ErrorCode,
        message: string,
        details: Record<string, unknown> = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        // Keep instanceof working for subclasses
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Failure while talking to the remote service or interpreting its answer. */
export class ClientError extends ConfRestError {}

/** A field or builder validation rule was violated. */
export class ConfigError extends ConfRestError {}

/**
 * Type guard for framework errors, optionally narrowed to one code.
 *
 * @example
 * ```typescript
 * try {
 *     await host.fetch(client);
 * }
 * catch (error) {
 *     if (isConfRestError(error, ERROR_CODES.OBJECT_NOT_FOUND)) {
 *         await host.create(client);
 *     }
 * }
 * ```
 */
export function isConfRestError(error: unknown, code?: ErrorCode): error is ConfRestError {
    if (!(error instanceof ConfRestError)) {
        return false;
    }
    return code === undefined || error.code === code;
}
