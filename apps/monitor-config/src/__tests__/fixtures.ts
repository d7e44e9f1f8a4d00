/**
 * @fileoverview Shared test collaborators
 *
 * @module __tests__/fixtures
 */

import { vi } from "vitest";
import type { ClientLogger, QueryParams, Transport } from "@confrest/core";

/**
 * Transport whose every verb is a spy.
 */
export function createMockTransport() {
    return {
        get   : vi.fn(async (_path: string, _params?: QueryParams): Promise<unknown> => ({})),
        post  : vi.fn(async (_path: string, _body: unknown): Promise<unknown> => ({})),
        put   : vi.fn(async (_path: string, _body: unknown): Promise<unknown> => ({})),
        delete: vi.fn(async (_path: string): Promise<unknown> => ({})),
    } satisfies Transport;
}

/**
 * Create a mock logger for testing.
 */
export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies ClientLogger;
}

/**
 * One complete list response.
 */
export function page(items: unknown[], totalPages = 1): unknown {
    return {
        list   : items,
        summary: {
            rows      : String(items.length),
            totalrows : String(items.length),
            totalpages: String(totalPages),
        },
    };
}
