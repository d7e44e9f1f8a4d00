/**
 * @fileoverview ConfigRefMap
 *
 * @module @confrest/core/collections/ConfigRefMap
 */

import type { ConfigObject, JsonCodec } from "../contracts/ConfigObject.js";
import type { ConfigRef, ConfigRefType } from "../contracts/ConfigRef.js";
import { KeyedCollection, decodeInto } from "./KeyedCollection.js";

/**
 * Collection of reference variants, keyed by their unique name.
 * Used for fields such as a host group's `hosts` or a host's
 * `hosttemplates`.
 */
export class ConfigRefMap<R extends ConfigRef> extends KeyedCollection<R> {
    /**
     * Decode a wire array of references.
     *
     * @throws NotAnArrayError if `value` is not an array
     * @throws DuplicateKeyError if two references compute the same key
     */
    static fromJSON<R extends ConfigRef>(
        codec: JsonCodec<R>,
        value: unknown,
        field = codec.typeName
    ): ConfigRefMap<R> {
        return decodeInto(new ConfigRefMap<R>(), codec, value, field);
    }

    /**
     * Derive references from full entities. The source is left untouched.
     *
     * @example
     * ```typescript
     * const refs = ConfigRefMap.fromObjects(HostRef, hosts);
     * ```
     */
    static fromObjects<R extends ConfigRef, T extends ConfigObject>(
        refType: ConfigRefType<R, T>,
        objects: Iterable<T>
    ): ConfigRefMap<R> {
        const refs = new ConfigRefMap<R>();
        for (const object of objects) {
            refs.add(refType.fromObject(object));
        }
        return refs;
    }
}
