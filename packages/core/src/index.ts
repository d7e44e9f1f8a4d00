/**
 * @fileoverview Configuration REST client framework
 *
 * Domain-agnostic building blocks for typed clients of a paginated
 * configuration REST service:
 * - Identifier resolution (ref / id / name) per operation
 * - Entity, builder, reference and persistent contracts
 * - Typed collections keyed by unique name
 * - Wire codecs for string-typed numbers and booleans
 * - A client with CRUD and a consistency-checked paginated fetch-all
 *
 * @module @confrest/core
 * @example
 * ```typescript
 * import { ConfigClient, type Transport } from "@confrest/core";
 *
 * const client = new ConfigClient({ transport });
 * const hosts = await client.getAllObjectConfigs(Host);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Identifiers,
    ResolvedIdentifier,
    ExistsIdentifier,
    RefIdentifier,
    IdIdentifier,
    NameIdentifier,
    Builder,
    ConfigObject,
    ConfigCodec,
    ConfigObjectType,
    ConfigTypeInfo,
    JsonCodec,
    ConfigRef,
    ConfigRefType,
    Persistent,
    Transport,
    QueryParams,
    ClientLogger,
} from "./contracts/index.js";
export {
    normalizeIdentifiers,
    resolveLookupIdentifier,
    resolveDeleteIdentifier,
    resolveExistsIdentifier,
    describeIdentifier,
    minimalFromBuilder,
    referenceOf,
    PersistentObject,
    cloneWithNewName,
    defaultLogger,
} from "./contracts/index.js";

// ============================================================================
// Collection exports
// ============================================================================

export {
    KeyedCollection,
    ConfigObjectMap,
    ConfigRefMap,
    refMapFrom,
    compareCollections,
    type CollectionComparison,
} from "./collections/index.js";

// ============================================================================
// Wire exports
// ============================================================================

export {
    wireUint,
    wireBool,
    wireOptionalBool,
    wireOptionalUint,
    wireOptionalString,
    encodeBool,
    omitUndefined,
    parseWire,
    parseSummary,
    type WireObject,
    type PageSummary,
} from "./wire/index.js";

// ============================================================================
// Client exports
// ============================================================================

export {
    ConfigClient,
    pathFromRef,
    fetchAllPages,
    type ConfigClientOptions,
} from "./client/index.js";

// ============================================================================
// Validation exports
// ============================================================================

export {
    validateTrimmedString,
    validateUntrimmedString,
    validateOptional,
    requireField,
    percentEncodedLengthAtMost,
    isValidUtf8mb3,
    type StringRule,
} from "./validation/index.js";

// ============================================================================
// Error exports
// ============================================================================

export * from "./errors/index.js";
