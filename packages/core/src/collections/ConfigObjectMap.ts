/**
 * @fileoverview ConfigObjectMap
 *
 * @module @confrest/core/collections/ConfigObjectMap
 */

import type { ConfigObject, JsonCodec } from "../contracts/ConfigObject.js";
import type { ConfigRef, ConfigRefType } from "../contracts/ConfigRef.js";
import { ConfigRefMap } from "./ConfigRefMap.js";
import { KeyedCollection, decodeInto } from "./KeyedCollection.js";

/**
 * Collection of full entities, keyed by their unique name.
 *
 * This is a client-side accumulator, not the system of record: the
 * fetch-all fills one per page and drains it into the result.
 *
 * @example
 * ```typescript
 * const tags = new ConfigObjectMap<Hashtag>();
 * tags.add(Hashtag.minimal("web"));
 * tags.add(Hashtag.minimal("web"));
 * tags.size; // 1
 * ```
 */
export class ConfigObjectMap<T extends ConfigObject> extends KeyedCollection<T> {
    /**
     * Decode a wire array of entities.
     *
     * @throws NotAnArrayError if `value` is not an array
     * @throws DuplicateKeyError if two entities compute the same key
     */
    static fromJSON<T extends ConfigObject>(
        codec: JsonCodec<T>,
        value: unknown,
        field = codec.typeName
    ): ConfigObjectMap<T> {
        return decodeInto(new ConfigObjectMap<T>(), codec, value, field);
    }

    /**
     * Derive the reference variant of every entity.
     */
    toRefMap<R extends ConfigRef>(refType: ConfigRefType<R, T>): ConfigRefMap<R> {
        return ConfigRefMap.fromObjects(refType, this.values());
    }
}

/**
 * Functional form of {@link ConfigObjectMap.toRefMap}.
 */
export function refMapFrom<T extends ConfigObject, R extends ConfigRef>(
    objects: ConfigObjectMap<T>,
    refType: ConfigRefType<R, T>
): ConfigRefMap<R> {
    return objects.toRefMap(refType);
}
