/**
 * @fileoverview Collection comparison
 *
 * @module @confrest/core/collections/compare
 */

import type { ConfigObject } from "../contracts/ConfigObject.js";
import type { KeyedCollection } from "./KeyedCollection.js";

export interface CollectionComparison {
    /** Keys only in `a` */
    readonly aExclusive: Set<string>;

    /** Keys only in `b` */
    readonly bExclusive: Set<string>;

    /** Keys in both */
    readonly common: Set<string>;
}

/**
 * Compare the key sets of two collections of the same type, e.g. a local
 * desired state against a freshly fetched remote one.
 *
 * @example
 * ```typescript
 * const { aExclusive, bExclusive } = compareCollections(desired, remote);
 * // aExclusive: to create, bExclusive: to remove
 * ```
 */
export function compareCollections<T extends ConfigObject>(
    a: KeyedCollection<T>,
    b: KeyedCollection<T>
): CollectionComparison {
    const aExclusive = new Set<string>();
    const bExclusive = new Set<string>();
    const common = new Set<string>();

    for (const key of a.keys()) {
        if (b.has(key)) {
            common.add(key);
        }
        else {
            aExclusive.add(key);
        }
    }
    for (const key of b.keys()) {
        if (!a.has(key)) {
            bExclusive.add(key);
        }
    }

    return { aExclusive, bExclusive, common };
}
