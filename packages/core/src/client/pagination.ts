/**
 * @fileoverview Paginated fetch-all
 *
 * Walks every page of a collection and accumulates the elements into one
 * {@link ConfigObjectMap}. Two consistency checks guard the result:
 *
 * 1. Every page must declare the same `totalrows` as page 1.
 * 2. After the last page, the accumulated size must equal `totalrows`.
 *
 * Either violation throws {@link RowCountMismatchError}; the partial
 * accumulator is discarded. Pages are requested strictly one after the
 * other because each page's summary decides whether to continue.
 *
 * @module @confrest/core/client/pagination
 */

import { ConfigObjectMap } from "../collections/ConfigObjectMap.js";
import type { ConfigObject, JsonCodec } from "../contracts/ConfigObject.js";
import type { ClientLogger } from "../contracts/Logger.js";
import type { QueryParams, Transport } from "../contracts/Transport.js";
import { RowCountMismatchError } from "../errors/ClientErrors.js";
import { parseSummary, requireList } from "../wire/envelopes.js";

export interface FetchAllOptions<T extends ConfigObject> {
    readonly transport: Transport;
    readonly codec: JsonCodec<T>;
    readonly path: string;
    readonly params?: QueryParams;
    readonly logger: ClientLogger;
}

/**
 * Query parameters for one page. Page 1 sends the caller's parameters
 * unchanged; later pages append `page=N` after them.
 */
export function pageParams(params: QueryParams | undefined, page: number): QueryParams | undefined {
    if (page === 1) {
        return params;
    }
    return [...(params ?? []), ["page", String(page)]];
}

/**
 * Fetch every page of a collection.
 *
 * @throws RowCountMismatchError if `totalrows` changes between pages, or
 *         the final size does not match it
 * @throws FieldNotFoundError if a page lacks `summary` or `list`
 * @throws NotAnArrayError if `list` is not an array
 * @throws DuplicateKeyError if a page contains two elements with the same key
 *
 * @example
 * ```typescript
 * const hosts = await fetchAllPages({
 *     transport,
 *     codec : Host,
 *     path  : "/config/host",
 *     params: [["rows", "50"]],
 *     logger,
 * });
 * ```
 */
export async function fetchAllPages<T extends ConfigObject>(
    options: FetchAllOptions<T>
): Promise<ConfigObjectMap<T>> {
    const { transport, codec, path, params, logger } = options;

    const accumulated = new ConfigObjectMap<T>();
    let expectedRows: number | undefined;
    let page = 1;

    for (;;) {
        const response = await transport.get(path, pageParams(params, page));
        const summary = parseSummary(response);

        if (expectedRows === undefined) {
            expectedRows = summary.totalRows;
        }
        else if (expectedRows !== summary.totalRows) {
            logger.error("Row count changed between pages", {
                path,
                page,
                expected: expectedRows,
                actual  : summary.totalRows,
            });
            throw new RowCountMismatchError(expectedRows, summary.totalRows);
        }

        const pageItems = ConfigObjectMap.fromJSON(codec, requireList(response), "list");
        logger.debug(`Fetched page ${page}/${summary.totalPages} of ${path}`, {
            rows: pageItems.size,
        });
        accumulated.extend(pageItems);

        // totalpages is "0" for an empty collection
        if (page >= summary.totalPages) {
            break;
        }
        page += 1;
    }

    if (accumulated.size !== expectedRows) {
        logger.error("Accumulated row count does not match summary", {
            path,
            expected: expectedRows,
            actual  : accumulated.size,
        });
        throw new RowCountMismatchError(expectedRows, accumulated.size);
    }

    return accumulated;
}
