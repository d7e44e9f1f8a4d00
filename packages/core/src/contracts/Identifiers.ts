/**
 * @fileoverview Identifier triple and resolution
 *
 * A persistent object may carry a server-assigned `ref`, a numeric `id`
 * and a caller-assigned `name`. Which one is presented to the service
 * depends on the operation:
 *
 * - fetch and delete: ref, then id, then name
 * - exists: id, then name (never ref, so the probe also works for objects
 *   that have not been created yet)
 *
 * Resolution happens before any request is sent; an object with none of
 * the identifiers fails with {@link MissingIdentifiersError}.
 *
 * @module @confrest/core/contracts/Identifiers
 */

import { MissingIdentifiersError } from "../errors/ClientErrors.js";

/**
 * The identifying values an object may carry.
 */
export interface Identifiers {
    /** Stable path-like string, assigned by the server on creation */
    readonly ref?: string;

    /** Server-assigned numeric key */
    readonly id?: number;

    /** Caller-assigned display key */
    readonly name?: string;
}

export type RefIdentifier = { readonly kind: "ref"; readonly ref: string };
export type IdIdentifier = { readonly kind: "id"; readonly id: number };
export type NameIdentifier = { readonly kind: "name"; readonly name: string };

/** The identifier chosen for one request. */
export type ResolvedIdentifier = RefIdentifier | IdIdentifier | NameIdentifier;

/** Identifiers usable by an existence probe. */
export type ExistsIdentifier = IdIdentifier | NameIdentifier;

/**
 * Drop empty strings so that `name: ""` counts as absent.
 */
export function normalizeIdentifiers(identifiers: Identifiers): Identifiers {
    return {
        ref : identifiers.ref === "" ? undefined : identifiers.ref,
        id  : identifiers.id,
        name: identifiers.name === "" ? undefined : identifiers.name,
    };
}

/**
 * Resolve the identifier for fetching an object.
 *
 * @param identifiers - Values carried by the object
 * @param typeName - Entity type name, used in the error
 * @throws MissingIdentifiersError if ref, id and name are all unset
 *
 * @example
 * ```typescript
 * resolveLookupIdentifier({ id: 7, name: "x" }, "Host");
 * // { kind: "id", id: 7 }
 * ```
 */
export function resolveLookupIdentifier(
    identifiers: Identifiers,
    typeName: string
): ResolvedIdentifier {
    const { ref, id, name } = normalizeIdentifiers(identifiers);

    if (ref !== undefined) {
        return { kind: "ref", ref };
    }
    if (id !== undefined) {
        return { kind: "id", id };
    }
    if (name !== undefined) {
        return { kind: "name", name };
    }
    throw new MissingIdentifiersError(typeName);
}

/**
 * Resolve the identifier for deleting an object. Same order as lookup.
 */
export function resolveDeleteIdentifier(
    identifiers: Identifiers,
    typeName: string
): ResolvedIdentifier {
    return resolveLookupIdentifier(identifiers, typeName);
}

/**
 * Resolve the identifier for an existence probe.
 *
 * @throws MissingIdentifiersError if neither id nor name is set
 */
export function resolveExistsIdentifier(
    identifiers: Identifiers,
    typeName: string
): ExistsIdentifier {
    const { id, name } = normalizeIdentifiers(identifiers);

    if (id !== undefined) {
        return { kind: "id", id };
    }
    if (name !== undefined) {
        return { kind: "name", name };
    }
    throw new MissingIdentifiersError(typeName);
}

/**
 * Human-readable form of a resolved identifier, for logs and errors.
 */
export function describeIdentifier(identifier: ResolvedIdentifier): string {
    switch (identifier.kind) {
        case "ref":
            return `ref=${identifier.ref}`;
        case "id":
            return `id=${identifier.id}`;
        case "name":
            return `name=${identifier.name}`;
    }
}
