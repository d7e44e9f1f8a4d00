/**
 * @fileoverview Host template entity
 *
 * Templates bundle service checks and management URLs applied to every
 * host that uses them. Management URLs are embedded as full objects.
 *
 * @module domain/entities/HostTemplate
 */

import * as z from "zod";
import {
    ConfigObjectMap,
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
import { validateDescription, validateHostTemplateName } from "../utils/validators.js";
import { HostRef } from "./HostRef.js";
import { ManagementUrl } from "./ManagementUrl.js";

const hostTemplateSchema = z.object({
    name          : z.string(),
    description   : wireOptionalString,
    has_icon      : wireOptionalUint,
    hosts         : z.unknown(),
    managementurls: z.unknown(),
    id            : wireOptionalUint,
    ref           : wireOptionalString,
    uncommitted   : wireOptionalBool,
});

export interface HostTemplateProps {
    name: string;
    description?: string;
    hasIcon?: number;
    hosts?: ConfigRefMap<HostRef>;
    managementUrls?: ConfigObjectMap<ManagementUrl>;
    id?: number;
    ref?: string;
    uncommitted?: boolean;
}

export class HostTemplate extends PersistentObject<HostTemplate> {
    static readonly typeName = "HostTemplate";
    static readonly configPath: string | null = "/config/hosttemplate";

    name: string;
    description?: string;
    hosts?: ConfigRefMap<HostRef>;
    managementUrls?: ConfigObjectMap<ManagementUrl>;

    // Read-only
    hasIcon?: number;
    uncommitted?: boolean;

    constructor(props: HostTemplateProps) {
        super();
        this.name = props.name;
        this.description = props.description;
        this.hasIcon = props.hasIcon;
        this.hosts = props.hosts;
        this.managementUrls = props.managementUrls;
        this.id = props.id;
        this.ref = props.ref;
        this.uncommitted = props.uncommitted;
    }

    static fromJSON(value: unknown): HostTemplate {
        const raw = parseWire(hostTemplateSchema, value, HostTemplate.typeName);
        return new HostTemplate({
            name          : raw.name,
            description   : raw.description,
            hasIcon       : raw.has_icon,
            hosts         : decodeOptional(raw.hosts, (hosts) => ConfigRefMap.fromJSON(HostRef, hosts, "hosts")),
            managementUrls: decodeOptional(raw.managementurls, (urls) => ConfigObjectMap.fromJSON(ManagementUrl, urls, "managementurls")),
            id            : raw.id,
            ref           : raw.ref,
            uncommitted   : raw.uncommitted,
        });
    }

    static builder(): HostTemplateBuilder {
        return new HostTemplateBuilder();
    }

    static minimal(name: string): HostTemplate {
        return new HostTemplate({ name: validateHostTemplateName(name) });
    }

    protected get codec(): ConfigCodec<HostTemplate> {
        return HostTemplate;
    }

    validatedName(name: string): string {
        return validateHostTemplateName(name);
    }

    clearReadonly(): void {
        super.clearReadonly();
        this.hasIcon = undefined;
        this.uncommitted = undefined;
    }

    toJSON(): WireObject {
        return omitUndefined({
            name          : this.name,
            description   : this.description,
            has_icon      : this.hasIcon,
            hosts         : this.hosts?.toJSON(),
            managementurls: this.managementUrls?.toJSON(),
            id            : this.id,
            ref           : this.ref,
            uncommitted   : encodeBool(this.uncommitted),
        });
    }
}

export class HostTemplateBuilder implements Builder<HostTemplate> {
    private readonly props: Partial<HostTemplateProps> = {};

    name(name: string): this {
        this.props.name = name;
        return this;
    }

    description(description: string): this {
        this.props.description = description;
        return this;
    }

    hosts(hosts: ConfigRefMap<HostRef>): this {
        this.props.hosts = hosts;
        return this;
    }

    managementUrls(managementUrls: ConfigObjectMap<ManagementUrl>): this {
        this.props.managementUrls = managementUrls;
        return this;
    }

    build(): HostTemplate {
        const name = requireField(this.props.name, "name");
        return new HostTemplate({
            name          : validateHostTemplateName(name),
            description   : validateOptional(this.props.description, validateDescription),
            hosts         : this.props.hosts,
            managementUrls: this.props.managementUrls,
        });
    }
}
