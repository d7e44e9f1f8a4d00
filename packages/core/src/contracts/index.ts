/**
 * @fileoverview Contract barrel exports
 *
 * @module @confrest/core/contracts
 */

export type {
    Identifiers,
    ResolvedIdentifier,
    ExistsIdentifier,
    RefIdentifier,
    IdIdentifier,
    NameIdentifier,
} from "./Identifiers.js";
export {
    normalizeIdentifiers,
    resolveLookupIdentifier,
    resolveDeleteIdentifier,
    resolveExistsIdentifier,
    describeIdentifier,
} from "./Identifiers.js";

export type { Builder } from "./Builder.js";
export { minimalFromBuilder } from "./Builder.js";

export type {
    ConfigObject,
    ConfigCodec,
    ConfigObjectType,
    ConfigTypeInfo,
    JsonCodec,
} from "./ConfigObject.js";

export type { ConfigRef, ConfigRefType } from "./ConfigRef.js";
export { referenceOf } from "./ConfigRef.js";

export type { Persistent } from "./Persistent.js";
export { PersistentObject, cloneWithNewName } from "./Persistent.js";

export type { Transport, QueryParams } from "./Transport.js";

export type { ClientLogger } from "./Logger.js";
export { defaultLogger } from "./Logger.js";
