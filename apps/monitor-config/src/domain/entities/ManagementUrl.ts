/**
 * @fileoverview Management URL
 *
 * Links shown in a host's context menu. They only exist embedded in a
 * host template, so the type has no resource path of its own. Names are
 * not unique, so the key appends the last five characters of the URL.
 *
 * @module domain/entities/ManagementUrl
 */

import * as z from "zod";
import {
    omitUndefined,
    parseWire,
    requireField,
    wireOptionalString,
    wireOptionalUint,
    type Builder,
    type ConfigObject,
    type WireObject,
} from "@confrest/core";
import { validateManagementUrlName, validateUrl } from "../utils/validators.js";

const managementUrlSchema = z.object({
    name: z.string(),
    url : wireOptionalString,
    id  : wireOptionalUint,
});

export interface ManagementUrlProps {
    name: string;
    url?: string;
    id?: number;
}

export class ManagementUrl implements ConfigObject {
    static readonly typeName = "ManagementUrl";
    static readonly configPath: string | null = null;

    name: string;
    url?: string;
    id?: number;

    constructor(props: ManagementUrlProps) {
        this.name = props.name;
        this.url = props.url;
        this.id = props.id;
    }

    static fromJSON(value: unknown): ManagementUrl {
        return new ManagementUrl(parseWire(managementUrlSchema, value, ManagementUrl.typeName));
    }

    static builder(): ManagementUrlBuilder {
        return new ManagementUrlBuilder();
    }

    /**
     * @example
     * ```typescript
     * new ManagementUrl({ name: "SSH", url: "ssh://$HOSTADDRESS$" }).uniqueName(); // "SSHRESS$"
     * new ManagementUrl({ name: "SSH", url: "x:/" }).uniqueName();                 // "SSHx:/"
     * ```
     */
    uniqueName(): string {
        if (this.url === undefined) {
            return this.name;
        }
        return this.name + (this.url.length < 5 ? this.url : this.url.slice(-5));
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, url: this.url, id: this.id });
    }
}

export class ManagementUrlBuilder implements Builder<ManagementUrl> {
    private nameValue?: string;
    private urlValue?: string;

    name(name: string): this {
        this.nameValue = name;
        return this;
    }

    url(url: string): this {
        this.urlValue = url;
        return this;
    }

    build(): ManagementUrl {
        const name = requireField(this.nameValue, "name");
        const url = requireField(this.urlValue, "url");
        return new ManagementUrl({
            name: validateManagementUrlName(name),
            url : validateUrl(url),
        });
    }
}
