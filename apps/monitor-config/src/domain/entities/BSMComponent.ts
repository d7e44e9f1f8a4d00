/**
 * @fileoverview Business service component entity
 *
 * A component is a set of hosts sharing a host template, with a quorum:
 * the percentage of those hosts that must be up for the component to be
 * considered available.
 *
 * Component names are not unique on the server, so the collection key
 * qualifies the name with the id (`"DB-12"`), falling back to the ref and
 * then the bare name for unsaved components.
 *
 * @module domain/entities/BSMComponent
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
import { validateBsmComponentName, validateQuorum } from "../utils/validators.js";
import { HostRef } from "./HostRef.js";
import { HostTemplateRef } from "./HostTemplateRef.js";

const bsmComponentSchema = z.object({
    name            : z.string(),
    host_template   : z.unknown(),
    host_template_id: wireOptionalUint,
    hosts           : z.unknown(),
    quorum_pct      : wireOptionalString,
    has_icon        : wireOptionalUint,
    id              : wireOptionalUint,
    ref             : wireOptionalString,
    uncommitted     : wireOptionalBool,
});

export interface BSMComponentProps {
    name: string;
    hostTemplate?: HostTemplateRef;
    hostTemplateId?: number;
    hosts?: ConfigRefMap<HostRef>;
    quorumPct?: string;
    hasIcon?: number;
    id?: number;
    ref?: string;
    uncommitted?: boolean;
}

export class BSMComponent extends PersistentObject<BSMComponent> {
    static readonly typeName = "BSMComponent";
    static readonly configPath: string | null = "/config/bsmcomponent";

    name: string;
    hostTemplate?: HostTemplateRef;
    hostTemplateId?: number;
    hosts?: ConfigRefMap<HostRef>;

    /** Two-decimal percentage string, e.g. `"66.67"` */
    quorumPct?: string;

    // Read-only
    hasIcon?: number;
    uncommitted?: boolean;

    constructor(props: BSMComponentProps) {
        super();
        this.name = props.name;
        this.hostTemplate = props.hostTemplate;
        this.hostTemplateId = props.hostTemplateId;
        this.hosts = props.hosts;
        this.quorumPct = props.quorumPct;
        this.hasIcon = props.hasIcon;
        this.id = props.id;
        this.ref = props.ref;
        this.uncommitted = props.uncommitted;
    }

    static fromJSON(value: unknown): BSMComponent {
        const raw = parseWire(bsmComponentSchema, value, BSMComponent.typeName);
        return new BSMComponent({
            name          : raw.name,
            hostTemplate  : decodeOptional(raw.host_template, HostTemplateRef.fromJSON),
            hostTemplateId: raw.host_template_id,
            hosts         : decodeOptional(raw.hosts, (hosts) => ConfigRefMap.fromJSON(HostRef, hosts, "hosts")),
            quorumPct     : raw.quorum_pct,
            hasIcon       : raw.has_icon,
            id            : raw.id,
            ref           : raw.ref,
            uncommitted   : raw.uncommitted,
        });
    }

    static builder(): BSMComponentBuilder {
        return new BSMComponentBuilder();
    }

    static minimal(name: string): BSMComponent {
        return new BSMComponent({ name: validateBsmComponentName(name) });
    }

    protected get codec(): ConfigCodec<BSMComponent> {
        return BSMComponent;
    }

    uniqueName(): string {
        if (this.id !== undefined) {
            return `${this.name}-${this.id}`;
        }
        return this.ref ?? this.name;
    }

    validatedName(name: string): string {
        return validateBsmComponentName(name);
    }

    clearReadonly(): void {
        super.clearReadonly();
        this.hasIcon = undefined;
        this.uncommitted = undefined;
    }

    toJSON(): WireObject {
        return omitUndefined({
            name            : this.name,
            host_template   : this.hostTemplate?.toJSON(),
            host_template_id: this.hostTemplateId,
            hosts           : this.hosts?.toJSON(),
            quorum_pct      : this.quorumPct,
            has_icon        : this.hasIcon,
            id              : this.id,
            ref             : this.ref,
            uncommitted     : encodeBool(this.uncommitted),
        });
    }
}

/**
 * @example
 * ```typescript
 * const databases = BSMComponent.builder()
 *     .name("Databases")
 *     .hostTemplate(HostTemplateRef.fromObject(dbTemplate))
 *     .hosts(ConfigRefMap.fromObjects(HostRef, [db1, db2, db3]))
 *     .quorumPct("66.67")
 *     .build();
 * ```
 */
export class BSMComponentBuilder implements Builder<BSMComponent> {
    private readonly props: Partial<BSMComponentProps> = {};

    name(name: string): this {
        this.props.name = name;
        return this;
    }

    hostTemplate(hostTemplate: HostTemplateRef): this {
        this.props.hostTemplate = hostTemplate;
        return this;
    }

    hostTemplateId(hostTemplateId: number): this {
        this.props.hostTemplateId = hostTemplateId;
        return this;
    }

    hosts(hosts: ConfigRefMap<HostRef>): this {
        this.props.hosts = hosts;
        return this;
    }

    quorumPct(quorumPct: string): this {
        this.props.quorumPct = quorumPct;
        return this;
    }

    build(): BSMComponent {
        const name = requireField(this.props.name, "name");
        const hostTemplate = requireField(this.props.hostTemplate, "hostTemplate");
        const hosts = requireField(this.props.hosts, "hosts");
        const quorumPct = requireField(this.props.quorumPct, "quorumPct");

        return new BSMComponent({
            name          : validateBsmComponentName(name),
            hostTemplate,
            hostTemplateId: this.props.hostTemplateId,
            hosts,
            quorumPct     : validateQuorum(quorumPct, hosts.size),
        });
    }
}
