/**
 * @fileoverview Entity contract
 *
 * Anything that can be placed in a typed collection implements
 * {@link ConfigObject}. The static side of an entity class (its
 * constructor object) implements {@link ConfigObjectType}, which is what
 * the client and the collections are parameterized with.
 *
 * @module @confrest/core/contracts/ConfigObject
 */

import type { WireObject } from "../wire/codec.js";
import type { Builder } from "./Builder.js";

/**
 * An entity or reference that can live in a typed collection.
 */
export interface ConfigObject {
    /**
     * Deterministic key used by typed collections. Usually the name; types
     * whose names are not unique on the server qualify it with id or ref.
     */
    uniqueName(): string;

    /** Wire representation, with booleans and numbers encoded as the service expects */
    toJSON(): WireObject;
}

/**
 * Decoder for one element type.
 */
export interface JsonCodec<T> {
    /** Type name used in errors and logs */
    readonly typeName: string;

    /**
     * Decode a wire value.
     *
     * @throws TypeParseError if the value does not describe a `T`
     */
    fromJSON(value: unknown): T;
}

/**
 * Where a type lives on the service.
 */
export interface ConfigTypeInfo {
    readonly typeName: string;

    /**
     * REST sub-path of the collection, e.g. `/config/host`.
     * `null` for types that only exist embedded in another entity.
     */
    readonly configPath: string | null;
}

/**
 * Decoder for an entity type that may have its own resource path.
 */
export interface ConfigCodec<T extends ConfigObject> extends JsonCodec<T>, ConfigTypeInfo {}

/**
 * Static side of an entity class.
 *
 * @example
 * ```typescript
 * class Hashtag implements ConfigObject {
 *     static readonly typeName = "Hashtag";
 *     static readonly configPath = "/config/keyword";
 *     static fromJSON(value: unknown): Hashtag { ... }
 *     static builder(): HashtagBuilder { ... }
 *     static minimal(name: string): Hashtag { ... }
 * }
 *
 * const type: ConfigObjectType<Hashtag> = Hashtag;
 * ```
 */
export interface ConfigObjectType<T extends ConfigObject> extends ConfigCodec<T> {
    /** Start a builder */
    builder(): Builder<T>;

    /** Smallest valid entity with the given name */
    minimal(name: string): T;
}
