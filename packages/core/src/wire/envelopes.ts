/**
 * @fileoverview Response envelopes
 *
 * Helpers for the wrapper fields the service puts around payloads:
 * `object` for single objects, `list` + `summary` for pages and
 * `exists` for existence probes.
 *
 * @module @confrest/core/wire/envelopes
 */

import * as z from "zod";
import {
    FieldNotFoundError,
    NotAnArrayError,
    TypeParseError,
} from "../errors/ClientErrors.js";
import { parseWire } from "./codec.js";

/**
 * Totals the service declares on every page.
 * Only lives for the duration of one fetch-all.
 */
export interface PageSummary {
    readonly totalRows: number;
    readonly totalPages: number;
}

const digitString = z.string().regex(/^\d+$/, "expected an unsigned integer string").transform(Number);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a field from a JSON object response.
 *
 * @throws FieldNotFoundError if the response is not an object or lacks the field
 */
export function requireField(response: unknown, field: string): unknown {
    if (!isRecord(response) || !(field in response) || response[field] === undefined) {
        throw new FieldNotFoundError(field);
    }
    return response[field];
}

/**
 * Read a field that must hold a JSON array.
 *
 * @throws FieldNotFoundError if absent
 * @throws NotAnArrayError if present but not an array
 */
export function requireList(response: unknown, field = "list"): unknown[] {
    const value = requireField(response, field);
    if (!Array.isArray(value)) {
        throw new NotAnArrayError(field);
    }
    return value;
}

/**
 * Parse the `summary` of a page. Both totals arrive as digit strings.
 *
 * @example
 * ```typescript
 * parseSummary({ list: [], summary: { totalrows: "25", totalpages: "3" } });
 * // { totalRows: 25, totalPages: 3 }
 * ```
 */
export function parseSummary(response: unknown): PageSummary {
    const summary = requireField(response, "summary");
    return {
        totalRows : parseWire(digitString, requireField(summary, "totalrows"), "summary.totalrows"),
        totalPages: parseWire(digitString, requireField(summary, "totalpages"), "summary.totalpages"),
    };
}

/**
 * Interpret the `exists` field of an existence probe.
 *
 * @throws FieldNotFoundError if absent
 * @throws TypeParseError for anything other than `"0"` or `"1"`
 */
export function parseExists(response: unknown): boolean {
    const value = requireField(response, "exists");
    if (value === "1") {
        return true;
    }
    if (value === "0") {
        return false;
    }
    throw new TypeParseError("exists", `unexpected value ${JSON.stringify(value)}`);
}
