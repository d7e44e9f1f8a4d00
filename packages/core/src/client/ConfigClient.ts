/**
 * @fileoverview ConfigClient
 *
 * Typed operations against a configuration REST service. The client is
 * domain-agnostic: every method takes the static side of an entity type
 * (its name, resource path and decoder) and works the same for all of
 * them.
 *
 * Wire contract:
 * - list page:      GET {path}[?params][&page=N] -> { list, summary }
 * - fetch by id:    GET {path}/{id}              -> { object }
 * - fetch by field: GET {path}?s.{field}={value} -> { list }
 * - fetch by ref:   GET {ref without /rest}      -> { object }
 * - exists:         GET {path}/exists?id=|name=  -> { exists: "0"|"1" }
 * - create:         POST {path} { object } or { list }
 * - update:         PUT {path} { object }
 * - delete:         DELETE {path}/{id} or the ref-derived path
 *
 * @module @confrest/core/client/ConfigClient
 */

import type { ConfigObjectMap } from "../collections/ConfigObjectMap.js";
import type { KeyedCollection } from "../collections/KeyedCollection.js";
import type {
    ConfigCodec,
    ConfigObject,
    ConfigTypeInfo,
} from "../contracts/ConfigObject.js";
import {
    describeIdentifier,
    resolveDeleteIdentifier,
    resolveExistsIdentifier,
    resolveLookupIdentifier,
    type Identifiers,
} from "../contracts/Identifiers.js";
import { defaultLogger, type ClientLogger } from "../contracts/Logger.js";
import type { QueryParams, Transport } from "../contracts/Transport.js";
import {
    FieldNotFoundError,
    IdNotFoundError,
    IdParseError,
    InvalidRefError,
    NoConfigPathError,
    ObjectNotFoundError,
    TypeParseError,
} from "../errors/ClientErrors.js";
import { wireUint } from "../wire/codec.js";
import { parseExists, requireField } from "../wire/envelopes.js";
import { fetchAllPages } from "./pagination.js";

/**
 * ConfigClient configuration.
 */
export interface ConfigClientOptions {
    /** Transport used for every request */
    readonly transport: Transport;

    /** Logger for client operations */
    readonly logger?: ClientLogger;
}

const REF_PREFIX = "/rest/config/";

/**
 * Rewrite a server ref (`/rest/config/host/7`) to a request path
 * (`/config/host/7`).
 *
 * @throws InvalidRefError if the ref does not start with `/rest/config/`
 */
export function pathFromRef(ref: string): string {
    if (!ref.startsWith(REF_PREFIX)) {
        throw new InvalidRefError(ref);
    }
    return `/config/${ref.slice(REF_PREFIX.length)}`;
}

function requirePath(type: ConfigTypeInfo): string {
    if (type.configPath === null) {
        throw new NoConfigPathError(type.typeName);
    }
    return type.configPath;
}

/**
 * Typed client for the configuration service.
 *
 * @example
 * ```typescript
 * const client = new ConfigClient({ transport });
 *
 * const hashtags = await client.getAllObjectConfigs(Hashtag);
 * const web = await client.getObjectConfig(Hashtag, { name: "web" });
 *
 * if (await client.changesToApply()) {
 *     await client.applyChanges();
 * }
 * ```
 */
export class ConfigClient {
    private readonly transport: Transport;
    private readonly logger: ClientLogger;

    constructor(options: ConfigClientOptions) {
        this.transport = options.transport;
        this.logger = options.logger ?? defaultLogger;
    }

    // ========================================================================
    // Lookup
    // ========================================================================

    /**
     * Check whether an object exists, by id if set, otherwise by name.
     * A ref is never used.
     *
     * @throws NoConfigPathError for embedded-only types
     * @throws MissingIdentifiersError if neither id nor name is set
     * @throws FieldNotFoundError if the response lacks `exists`
     * @throws TypeParseError if `exists` is neither "0" nor "1"
     */
    async objectExists(type: ConfigTypeInfo, identifiers: Identifiers): Promise<boolean> {
        const path = requirePath(type);
        const identifier = resolveExistsIdentifier(identifiers, type.typeName);

        const params: QueryParams = identifier.kind === "id"
            ? [["id", String(identifier.id)]]
            : [["name", identifier.name]];

        this.logger.debug(`Checking whether ${type.typeName} exists`, {
            identifier: describeIdentifier(identifier),
        });

        const response = await this.transport.get(`${path}/exists`, params);
        return parseExists(response);
    }

    /**
     * Fetch one object, by ref if set, otherwise id, otherwise name.
     *
     * @throws MissingIdentifiersError if no identifier is set
     * @throws NoConfigPathError for an id or name lookup on an embedded-only type
     * @throws ObjectNotFoundError if the response holds no object
     * @throws TypeParseError if the payload does not decode into the type
     */
    async getObjectConfig<T extends ConfigObject>(
        type: ConfigCodec<T>,
        identifiers: Identifiers,
        params?: QueryParams
    ): Promise<T> {
        const identifier = resolveLookupIdentifier(identifiers, type.typeName);

        switch (identifier.kind) {
            case "ref":
                return this.getObjectConfigByRef(type, identifier.ref, params);
            case "id":
                return this.getObjectConfigById(type, identifier.id, params);
            case "name":
                return this.getObjectConfigByKey(type, "name", identifier.name, params);
        }
    }

    /**
     * `GET {path}/{id}`, reading the `object` wrapper.
     */
    async getObjectConfigById<T extends ConfigObject>(
        type: ConfigCodec<T>,
        id: number,
        params?: QueryParams
    ): Promise<T> {
        const path = `${requirePath(type)}/${id}`;
        const response = await this.transport.get(path, params);
        return type.fromJSON(this.requireObject(response, type.typeName, `id=${id}`));
    }

    /**
     * `GET {path}?s.{key}={value}`, taking the first element of `list`.
     */
    async getObjectConfigByKey<T extends ConfigObject>(
        type: ConfigCodec<T>,
        key: string,
        value: string,
        params?: QueryParams
    ): Promise<T> {
        const path = requirePath(type);
        const response = await this.transport.get(path, [[`s.${key}`, value], ...(params ?? [])]);
        const first = this.firstListElement(response);
        if (first === undefined) {
            throw new ObjectNotFoundError(type.typeName, `${key}=${value}`);
        }
        return type.fromJSON(first);
    }

    /**
     * `GET` the path derived from a ref, reading the `object` wrapper.
     */
    async getObjectConfigByRef<T extends ConfigObject>(
        type: ConfigCodec<T>,
        ref: string,
        params?: QueryParams
    ): Promise<T> {
        const path = pathFromRef(ref);
        const response = await this.transport.get(path, params);
        return type.fromJSON(this.requireObject(response, type.typeName, `ref=${ref}`));
    }

    /**
     * Look up the numeric id of the first object matching `s.{key}={value}`.
     *
     * @throws IdNotFoundError if nothing matched or the match has no id
     * @throws IdParseError if the id is not an unsigned integer
     */
    async getObjectIdByKey(
        type: ConfigTypeInfo,
        key: string,
        value: string,
        params?: QueryParams
    ): Promise<number> {
        const path = requirePath(type);
        const response = await this.transport.get(path, [[`s.${key}`, value], ...(params ?? [])]);
        const first = this.firstListElement(response);

        let rawId: unknown;
        try {
            rawId = requireField(first, "id");
        }
        catch (error) {
            if (error instanceof FieldNotFoundError) {
                throw new IdNotFoundError(type.typeName, key, value);
            }
            throw error;
        }

        const parsed = wireUint.safeParse(rawId);
        if (!parsed.success) {
            throw new IdParseError(rawId);
        }
        return parsed.data;
    }

    /**
     * Fetch every object of a type across all pages.
     *
     * @throws NoConfigPathError for embedded-only types
     * @throws RowCountMismatchError if the collection changed while paging
     */
    async getAllObjectConfigs<T extends ConfigObject>(
        type: ConfigCodec<T>,
        params?: QueryParams
    ): Promise<ConfigObjectMap<T>> {
        const path = requirePath(type);
        const objects = await fetchAllPages({
            transport: this.transport,
            codec    : type,
            path,
            params,
            logger   : this.logger,
        });
        this.logger.info(`Fetched ${objects.size} ${type.typeName} object(s)`);
        return objects;
    }

    // ========================================================================
    // Mutation
    // ========================================================================

    /**
     * Create an object. Existence is not checked first.
     *
     * @returns The raw response body
     */
    async postNewObjectConfig(type: ConfigTypeInfo, object: ConfigObject): Promise<unknown> {
        const path = requirePath(type);
        this.logger.debug(`Creating ${type.typeName}`, { key: object.uniqueName() });
        return this.transport.post(path, { object: object.toJSON() });
    }

    /**
     * Create every object of a collection in one request.
     *
     * @returns The raw response body
     */
    async postNewObjectConfigMap<T extends ConfigObject>(
        type: ConfigTypeInfo,
        objects: KeyedCollection<T>
    ): Promise<unknown> {
        const path = requirePath(type);
        this.logger.debug(`Creating ${objects.size} ${type.typeName} object(s)`);
        return this.transport.post(path, { list: objects.toJSON() });
    }

    /**
     * Update an object. The service decides whether this creates or updates.
     *
     * @returns The raw response body
     */
    async putObjectConfig(type: ConfigTypeInfo, object: ConfigObject): Promise<unknown> {
        const path = requirePath(type);
        this.logger.debug(`Updating ${type.typeName}`, { key: object.uniqueName() });
        return this.transport.put(path, { object: object.toJSON() });
    }

    /**
     * Delete an object by ref if set, otherwise id, otherwise name. A name
     * is first resolved to an id.
     *
     * @returns The raw response body
     */
    async deleteObjectConfig(type: ConfigTypeInfo, identifiers: Identifiers): Promise<unknown> {
        const identifier = resolveDeleteIdentifier(identifiers, type.typeName);
        this.logger.debug(`Deleting ${type.typeName}`, {
            identifier: describeIdentifier(identifier),
        });

        switch (identifier.kind) {
            case "ref":
                return this.transport.delete(pathFromRef(identifier.ref));
            case "id":
                return this.transport.delete(`${requirePath(type)}/${identifier.id}`);
            case "name": {
                const id = await this.getObjectIdByKey(type, "name", identifier.name);
                return this.transport.delete(`${requirePath(type)}/${id}`);
            }
        }
    }

    // ========================================================================
    // Reload management
    // ========================================================================

    /**
     * Apply pending configuration changes.
     *
     * @returns The reload status reported by the service
     */
    async applyChanges(): Promise<unknown> {
        this.logger.info("Applying pending configuration changes");
        return this.transport.post("/reload", null);
    }

    /**
     * Whether there are configuration changes waiting to be applied.
     *
     * @throws FieldNotFoundError if the response lacks `configuration_status`
     * @throws TypeParseError for a status other than "uptodate" or "pending"
     */
    async changesToApply(): Promise<boolean> {
        const response = await this.transport.get("/reload");
        const status = requireField(response, "configuration_status");
        if (status === "pending") {
            return true;
        }
        if (status === "uptodate") {
            return false;
        }
        throw new TypeParseError("configuration_status", `unexpected value ${JSON.stringify(status)}`);
    }

    /**
     * Unix timestamp of the last configuration change.
     */
    async lastUpdated(): Promise<number> {
        const response = await this.transport.get("/reload");
        const value = requireField(response, "lastupdated");
        const parsed = wireUint.safeParse(value);
        if (!parsed.success) {
            throw new TypeParseError("lastupdated", `expected an unsigned integer, got ${JSON.stringify(value)}`);
        }
        return parsed.data;
    }

    // ========================================================================
    // Response helpers
    // ========================================================================

    private requireObject(response: unknown, typeName: string, lookup: string): unknown {
        try {
            return requireField(response, "object");
        }
        catch (error) {
            if (error instanceof FieldNotFoundError) {
                throw new ObjectNotFoundError(typeName, lookup);
            }
            throw error;
        }
    }

    /** First element of `list`, or undefined when there is none */
    private firstListElement(response: unknown): unknown {
        if (typeof response !== "object" || response === null || !("list" in response)) {
            return undefined;
        }
        const list = response.list;
        return Array.isArray(list) ? list[0] : undefined;
    }
}
