/**
 * @fileoverview Host group entity
 *
 * Host groups form a tree. A group's name is only unique among its
 * siblings; the server-computed materialized path (`matpath`, e.g.
 * `"Opsview,Web,"`) is unique across the tree and is used as the key
 * whenever it is known.
 *
 * @module domain/entities/HostGroup
 */

import * as z from "zod";
import {
    ConfigRefMap,
    PersistentObject,
    encodeBool,
    omitUndefined,
    parseWire,
    requireField,
    wireOptionalBool,
    wireOptionalString,
    wireOptionalUint,
    type Builder,
    type ConfigCodec,
    type WireObject,
} from "@confrest/core";
import { decodeOptional } from "../utils/decode.js";
import { validateHostGroupName } from "../utils/validators.js";
import { HostGroupRef } from "./HostGroupRef.js";
import { HostRef } from "./HostRef.js";

const hostGroupSchema = z.object({
    name       : z.string(),
    children   : z.unknown(),
    hosts      : z.unknown(),
    parent     : z.unknown(),
    id         : wireOptionalUint,
    is_leaf    : wireOptionalBool,
    matpath    : wireOptionalString,
    ref        : wireOptionalString,
    uncommitted: wireOptionalBool,
});

export interface HostGroupProps {
    name: string;
    children?: ConfigRefMap<HostGroupRef>;
    hosts?: ConfigRefMap<HostRef>;
    parent?: HostGroupRef;
    id?: number;
    isLeaf?: boolean;
    matpath?: string;
    ref?: string;
    uncommitted?: boolean;
}

export class HostGroup extends PersistentObject<HostGroup> {
    static readonly typeName = "HostGroup";
    static readonly configPath: string | null = "/config/hostgroup";

    name: string;
    children?: ConfigRefMap<HostGroupRef>;
    hosts?: ConfigRefMap<HostRef>;
    parent?: HostGroupRef;

    // Read-only, computed by the server
    isLeaf?: boolean;
    matpath?: string;
    uncommitted?: boolean;

    constructor(props: HostGroupProps) {
        super();
        this.name = props.name;
        this.children = props.children;
        this.hosts = props.hosts;
        this.parent = props.parent;
        this.id = props.id;
        this.isLeaf = props.isLeaf;
        this.matpath = props.matpath;
        this.ref = props.ref;
        this.uncommitted = props.uncommitted;
    }

    static fromJSON(value: unknown): HostGroup {
        const raw = parseWire(hostGroupSchema, value, HostGroup.typeName);
        return new HostGroup({
            name       : raw.name,
            children   : decodeOptional(raw.children, (children) => ConfigRefMap.fromJSON(HostGroupRef, children, "children")),
            hosts      : decodeOptional(raw.hosts, (hosts) => ConfigRefMap.fromJSON(HostRef, hosts, "hosts")),
            parent     : decodeOptional(raw.parent, HostGroupRef.fromJSON),
            id         : raw.id,
            isLeaf     : raw.is_leaf,
            matpath    : raw.matpath,
            ref        : raw.ref,
            uncommitted: raw.uncommitted,
        });
    }

    static builder(): HostGroupBuilder {
        return new HostGroupBuilder();
    }

    static minimal(name: string): HostGroup {
        return new HostGroup({ name: validateHostGroupName(name) });
    }

    protected get codec(): ConfigCodec<HostGroup> {
        return HostGroup;
    }

    uniqueName(): string {
        return this.matpath ?? this.name;
    }

    validatedName(name: string): string {
        return validateHostGroupName(name);
    }

    clearReadonly(): void {
        super.clearReadonly();
        this.isLeaf = undefined;
        this.matpath = undefined;
        this.uncommitted = undefined;
    }

    toJSON(): WireObject {
        return omitUndefined({
            name       : this.name,
            children   : this.children?.toJSON(),
            hosts      : this.hosts?.toJSON(),
            parent     : this.parent?.toJSON(),
            id         : this.id,
            is_leaf    : encodeBool(this.isLeaf),
            matpath    : this.matpath,
            ref        : this.ref,
            uncommitted: encodeBool(this.uncommitted),
        });
    }
}

/**
 * @example
 * ```typescript
 * const web = HostGroup.builder()
 *     .name("Web")
 *     .parent(new HostGroupRef("Opsview", "Opsview,", "/rest/config/hostgroup/1"))
 *     .build();
 * ```
 */
export class HostGroupBuilder implements Builder<HostGroup> {
    private readonly props: Partial<HostGroupProps> = {};

    name(name: string): this {
        this.props.name = name;
        return this;
    }

    children(children: ConfigRefMap<HostGroupRef>): this {
        this.props.children = children;
        return this;
    }

    hosts(hosts: ConfigRefMap<HostRef>): this {
        this.props.hosts = hosts;
        return this;
    }

    parent(parent: HostGroupRef): this {
        this.props.parent = parent;
        return this;
    }

    build(): HostGroup {
        const name = requireField(this.props.name, "name");
        return new HostGroup({
            name    : validateHostGroupName(name),
            children: this.props.children,
            hosts   : this.props.hosts,
            parent  : this.props.parent,
        });
    }
}
