/**
 * @fileoverview Transport contract
 *
 * The client only needs four verbs. Paths are relative to the service's
 * REST root (e.g. `/config/host`); the transport adds the base URL,
 * credentials and headers, maps non-200 statuses to errors, and returns
 * the parsed JSON body.
 *
 * Timeouts and cancellation belong to the transport; they surface as
 * rejected promises.
 */

/** Ordered query parameters. Keys may repeat. */
export type QueryParams = ReadonlyArray<readonly [string, string]>;

export interface Transport {
    get(path: string, params?: QueryParams): Promise<unknown>;
    post(path: string, body: unknown): Promise<unknown>;
    put(path: string, body: unknown): Promise<unknown>;
    delete(path: string): Promise<unknown>;
}
