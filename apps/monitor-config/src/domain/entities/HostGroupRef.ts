/**
 * @fileoverview Host group reference
 *
 * Host group names are only unique among siblings, so references carry
 * the materialized path (`Opsview,Web,`) and key on it when known.
 *
 * @module domain/entities/HostGroupRef
 */

import * as z from "zod";
import {
    omitUndefined,
    parseWire,
    wireOptionalString,
    type ConfigRef,
    type WireObject,
} from "@confrest/core";
import type { HostGroup } from "./HostGroup.js";

const hostGroupRefSchema = z.object({
    name   : z.string(),
    matpath: wireOptionalString,
    ref    : wireOptionalString,
});

export class HostGroupRef implements ConfigRef {
    static readonly typeName = "HostGroupRef";

    constructor(
        readonly name: string,
        readonly matpath?: string,
        readonly ref?: string
    ) {}

    static fromJSON(value: unknown): HostGroupRef {
        const parsed = parseWire(hostGroupRefSchema, value, HostGroupRef.typeName);
        return new HostGroupRef(parsed.name, parsed.matpath, parsed.ref);
    }

    static fromObject(group: HostGroup): HostGroupRef {
        return new HostGroupRef(group.name, group.matpath, group.ref);
    }

    uniqueName(): string {
        return this.matpath ?? this.name;
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, matpath: this.matpath, ref: this.ref });
    }
}
