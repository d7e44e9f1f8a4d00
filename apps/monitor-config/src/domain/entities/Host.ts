/**
 * @fileoverview Host entity
 *
 * A monitored device. Every host belongs to exactly one host group and
 * needs an address, so the builder requires name, ip and hostgroup.
 *
 * @module domain/entities/Host
 */

import * as z from "zod";
import {
    ConfigRefMap,
    PersistentObject,
    encodeBool,
    omitUndefined,
    parseWire,
    requireField,
    validateOptional,
    wireOptionalBool,
    wireOptionalString,
    wireOptionalUint,
    type Builder,
    type ConfigCodec,
    type WireObject,
} from "@confrest/core";
import { decodeOptional } from "../utils/decode.js";
import {
    validateDescription,
    validateHostName,
    validateIpOrHostname,
} from "../utils/validators.js";
import { HostGroupRef } from "./HostGroupRef.js";
import { HostRef } from "./HostRef.js";
import { HostTemplateRef } from "./HostTemplateRef.js";

const hostSchema = z.object({
    name         : z.string(),
    ip           : wireOptionalString,
    alias        : wireOptionalString,
    hostgroup    : z.unknown(),
    hosttemplates: z.unknown(),
    parents      : z.unknown(),
    id           : wireOptionalUint,
    last_updated : wireOptionalUint,
    ref          : wireOptionalString,
    uncommitted  : wireOptionalBool,
});

export interface HostProps {
    name: string;
    ip?: string;
    alias?: string;
    hostgroup?: HostGroupRef;
    hosttemplates?: ConfigRefMap<HostTemplateRef>;
    parents?: ConfigRefMap<HostRef>;
    id?: number;
    lastUpdated?: number;
    ref?: string;
    uncommitted?: boolean;
}

/**
 * @example
 * ```typescript
 * const host = Host.builder()
 *     .name("web-01")
 *     .ip("10.0.0.11")
 *     .hostgroup(HostGroupRef.fromObject(webGroup))
 *     .build();
 * ```
 */
export class Host extends PersistentObject<Host> {
    static readonly typeName = "Host";
    static readonly configPath: string | null = "/config/host";

    name: string;
    ip?: string;
    alias?: string;
    hostgroup?: HostGroupRef;
    hosttemplates?: ConfigRefMap<HostTemplateRef>;
    parents?: ConfigRefMap<HostRef>;

    // Read-only
    lastUpdated?: number;
    uncommitted?: boolean;

    constructor(props: HostProps) {
        super();
        this.name = props.name;
        this.ip = props.ip;
        this.alias = props.alias;
        this.hostgroup = props.hostgroup;
        this.hosttemplates = props.hosttemplates;
        this.parents = props.parents;
        this.id = props.id;
        this.lastUpdated = props.lastUpdated;
        this.ref = props.ref;
        this.uncommitted = props.uncommitted;
    }

    static fromJSON(value: unknown): Host {
        const raw = parseWire(hostSchema, value, Host.typeName);
        return new Host({
            name         : raw.name,
            ip           : raw.ip,
            alias        : raw.alias,
            hostgroup    : decodeOptional(raw.hostgroup, HostGroupRef.fromJSON),
            hosttemplates: decodeOptional(raw.hosttemplates, (templates) => ConfigRefMap.fromJSON(HostTemplateRef, templates, "hosttemplates")),
            parents      : decodeOptional(raw.parents, (parents) => ConfigRefMap.fromJSON(HostRef, parents, "parents")),
            id           : raw.id,
            lastUpdated  : raw.last_updated,
            ref          : raw.ref,
            uncommitted  : raw.uncommitted,
        });
    }

    static builder(): HostBuilder {
        return new HostBuilder();
    }

    /** Name only; the result is enough for lookups and deletes, not for creation. */
    static minimal(name: string): Host {
        return new Host({ name: validateHostName(name) });
    }

    protected get codec(): ConfigCodec<Host> {
        return Host;
    }

    validatedName(name: string): string {
        return validateHostName(name);
    }

    clearReadonly(): void {
        super.clearReadonly();
        this.lastUpdated = undefined;
        this.uncommitted = undefined;
    }

    toJSON(): WireObject {
        return omitUndefined({
            name         : this.name,
            ip           : this.ip,
            alias        : this.alias,
            hostgroup    : this.hostgroup?.toJSON(),
            hosttemplates: this.hosttemplates?.toJSON(),
            parents      : this.parents?.toJSON(),
            id           : this.id,
            last_updated : this.lastUpdated,
            ref          : this.ref,
            uncommitted  : encodeBool(this.uncommitted),
        });
    }
}

export class HostBuilder implements Builder<Host> {
    private readonly props: Partial<HostProps> = {};

    name(name: string): this {
        this.props.name = name;
        return this;
    }

    ip(ip: string): this {
        this.props.ip = ip;
        return this;
    }

    alias(alias: string): this {
        this.props.alias = alias;
        return this;
    }

    hostgroup(hostgroup: HostGroupRef): this {
        this.props.hostgroup = hostgroup;
        return this;
    }

    hosttemplates(hosttemplates: ConfigRefMap<HostTemplateRef>): this {
        this.props.hosttemplates = hosttemplates;
        return this;
    }

    parents(parents: ConfigRefMap<HostRef>): this {
        this.props.parents = parents;
        return this;
    }

    build(): Host {
        const name = requireField(this.props.name, "name");
        const ip = requireField(this.props.ip, "ip");
        const hostgroup = requireField(this.props.hostgroup, "hostgroup");

        return new Host({
            name         : validateHostName(name),
            ip           : validateIpOrHostname(ip),
            alias        : validateOptional(this.props.alias, validateDescription),
            hostgroup,
            hosttemplates: this.props.hosttemplates,
            parents      : this.props.parents,
        });
    }
}
