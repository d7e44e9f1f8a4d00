/**
 * @fileoverview Reference variant contract
 *
 * When an entity is embedded in another entity's fields it is sent as a
 * reference: name and ref, plus a few denormalized fields for some types.
 * References are derived one way from full entities and never mutate
 * their source.
 *
 * @module @confrest/core/contracts/ConfigRef
 */

import type { ConfigObject, JsonCodec } from "./ConfigObject.js";

/**
 * Lightweight projection of a full entity.
 */
export interface ConfigRef extends ConfigObject {
    readonly name: string;
    readonly ref?: string;
}

/**
 * Static side of a reference class.
 *
 * @typeParam R - The reference type
 * @typeParam T - The full entity type it is derived from
 */
export interface ConfigRefType<R extends ConfigRef, T> extends JsonCodec<R> {
    /** Derive the reference from a full entity */
    fromObject(object: T): R;
}

/**
 * Derive the reference variant of a full entity.
 *
 * @example
 * ```typescript
 * const ref = referenceOf(HostGroupRef, group);
 * ref.name === group.name; // true
 * ref.ref === group.ref;   // true
 * ```
 */
export function referenceOf<R extends ConfigRef, T>(refType: ConfigRefType<R, T>, object: T): R {
    return refType.fromObject(object);
}
