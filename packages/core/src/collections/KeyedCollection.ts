/**
 * @fileoverview Keyed collection base
 *
 * Shared implementation behind {@link ConfigObjectMap} and
 * {@link ConfigRefMap}: a map from an element's unique name to the
 * element itself.
 *
 * Rules:
 * - Keys are computed with `uniqueName()` at insertion time.
 * - Inserting under an existing key replaces the old value.
 * - Serialization produces a plain array; keys are never sent.
 * - Decoding an array rejects two elements with the same key.
 *
 * Elements are held by reference, so adding an object that also lives in
 * another collection shares it rather than copying it.
 *
 * @module @confrest/core/collections/KeyedCollection
 */

import type { ConfigObject, JsonCodec } from "../contracts/ConfigObject.js";
import { DuplicateKeyError, NotAnArrayError } from "../errors/ClientErrors.js";
import type { WireObject } from "../wire/codec.js";

export class KeyedCollection<T extends ConfigObject> implements Iterable<T> {
    protected readonly items: Map<string, T> = new Map();

    constructor(items: Iterable<T> = []) {
        for (const item of items) {
            this.add(item);
        }
    }

    /**
     * Insert an element under its unique name. Last write wins.
     */
    add(item: T): void {
        this.items.set(item.uniqueName(), item);
    }

    get(key: string): T | undefined {
        return this.items.get(key);
    }

    has(key: string): boolean {
        return this.items.has(key);
    }

    /**
     * Remove and return the element stored under `key`.
     */
    remove(key: string): T | undefined {
        const item = this.items.get(key);
        this.items.delete(key);
        return item;
    }

    get size(): number {
        return this.items.size;
    }

    isEmpty(): boolean {
        return this.items.size === 0;
    }

    keys(): IterableIterator<string> {
        return this.items.keys();
    }

    values(): IterableIterator<T> {
        return this.items.values();
    }

    entries(): IterableIterator<[string, T]> {
        return this.items.entries();
    }

    [Symbol.iterator](): Iterator<T> {
        return this.items.values();
    }

    asArray(): T[] {
        return Array.from(this.items.values());
    }

    /**
     * Remove and return every entry, leaving the collection empty.
     */
    drain(): Array<[string, T]> {
        const drained = Array.from(this.items.entries());
        this.items.clear();
        return drained;
    }

    /**
     * Move every entry of `other` into this collection. `other` is left
     * empty; on key collision the entry from `other` wins.
     */
    extend(other: KeyedCollection<T>): void {
        for (const [key, item] of other.drain()) {
            this.items.set(key, item);
        }
    }

    /**
     * Same key set, and the same wire representation under every key.
     */
    equals(other: KeyedCollection<T>): boolean {
        if (this.size !== other.size) {
            return false;
        }
        for (const [key, item] of this.items) {
            const theirs = other.get(key);
            if (theirs === undefined) {
                return false;
            }
            if (theirs !== item && JSON.stringify(theirs.toJSON()) !== JSON.stringify(item.toJSON())) {
                return false;
            }
        }
        return true;
    }

    toJSON(): WireObject[] {
        return this.asArray().map((item) => item.toJSON());
    }
}

/**
 * Decode a wire array into `target`, re-deriving every key.
 *
 * @param target - Empty collection to fill
 * @param codec - Element decoder
 * @param value - Raw JSON value
 * @param field - Field name reported when `value` is not an array
 * @throws NotAnArrayError if `value` is not an array
 * @throws DuplicateKeyError if two elements compute the same key
 */
export function decodeInto<T extends ConfigObject, C extends KeyedCollection<T>>(
    target: C,
    codec: JsonCodec<T>,
    value: unknown,
    field: string
): C {
    if (!Array.isArray(value)) {
        throw new NotAnArrayError(field);
    }
    for (const element of value) {
        const item = codec.fromJSON(element);
        const key = item.uniqueName();
        if (target.has(key)) {
            throw new DuplicateKeyError(key);
        }
        target.add(item);
    }
    return target;
}
