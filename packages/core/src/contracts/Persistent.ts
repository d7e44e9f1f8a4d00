/**
 * @fileoverview Persistent contract
 *
 * Entities with their own resource path extend {@link PersistentObject}
 * and get exists, fetch, create, update and remove for free. Each
 * operation resolves the identifier to use and delegates to a
 * {@link ConfigClient}.
 *
 * @module @confrest/core/contracts/Persistent
 */

import type { ConfigClient } from "../client/ConfigClient.js";
import type { ConfigCodec, ConfigObject } from "./ConfigObject.js";
import type { Identifiers } from "./Identifiers.js";
import type { WireObject } from "../wire/codec.js";

/**
 * An entity that can be stored on and retrieved from the service.
 */
export interface Persistent extends ConfigObject, Identifiers {
    /** Reset every server-assigned field so the object is treated as new */
    clearReadonly(): void;

    /**
     * Validate and set a new name.
     *
     * @returns The validated (trimmed) name
     * @throws ConfigError subclass if the name is not valid for the type
     */
    setName(name: string): string;
}

/**
 * Base class for persistent entities.
 *
 * @typeParam TSelf - The concrete entity class
 *
 * @example
 * ```typescript
 * const tag = Hashtag.minimal("web");
 * if (!(await tag.exists(client))) {
 *     await tag.create(client);
 * }
 * ```
 */
export abstract class PersistentObject<TSelf extends PersistentObject<TSelf>> implements Persistent {
    abstract name: string;

    /** Server-assigned numeric key */
    id?: number;

    /** Server-assigned reference path */
    ref?: string;

    /** Static side of the concrete class */
    protected abstract readonly codec: ConfigCodec<TSelf>;

    abstract toJSON(): WireObject;

    /**
     * Validate a candidate name against the type's rules.
     *
     * @throws ConfigError subclass on the first violated rule
     */
    abstract validatedName(name: string): string;

    uniqueName(): string {
        return this.name;
    }

    identifiers(): Identifiers {
        return { ref: this.ref, id: this.id, name: this.name };
    }

    setName(name: string): string {
        const validated = this.validatedName(name);
        this.name = validated;
        return validated;
    }

    clearReadonly(): void {
        this.id = undefined;
        this.ref = undefined;
    }

    exists(client: ConfigClient): Promise<boolean> {
        return client.objectExists(this.codec, this.identifiers());
    }

    fetch(client: ConfigClient): Promise<TSelf> {
        return client.getObjectConfig(this.codec, this.identifiers());
    }

    create(client: ConfigClient): Promise<unknown> {
        return client.postNewObjectConfig(this.codec, this);
    }

    update(client: ConfigClient): Promise<unknown> {
        return client.putObjectConfig(this.codec, this);
    }

    remove(client: ConfigClient): Promise<unknown> {
        return client.deleteObjectConfig(this.codec, this.identifiers());
    }
}

/**
 * Copy an entity under a new name with every read-only field cleared, so
 * that creating the copy adds a new object instead of updating the
 * original.
 *
 * @throws ConfigError subclass if `newName` is not valid for the type
 */
export function cloneWithNewName<T extends Persistent>(
    codec: ConfigCodec<T>,
    original: T,
    newName: string
): T {
    const copy = codec.fromJSON(original.toJSON());
    copy.clearReadonly();
    copy.setName(newName);
    return copy;
}
