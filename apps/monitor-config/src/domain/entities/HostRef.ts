/**
 * @fileoverview Host reference
 *
 * @module domain/entities/HostRef
 */

import * as z from "zod";
import {
    omitUndefined,
    parseWire,
    wireOptionalString,
    type ConfigRef,
    type WireObject,
} from "@confrest/core";
import type { Host } from "./Host.js";

const hostRefSchema = z.object({
    name: z.string(),
    ref : wireOptionalString,
});

/**
 * A host as it appears inside hashtags, host groups, host templates and
 * business components.
 */
export class HostRef implements ConfigRef {
    static readonly typeName = "HostRef";

    constructor(
        readonly name: string,
        readonly ref?: string
    ) {}

    static fromJSON(value: unknown): HostRef {
        const parsed = parseWire(hostRefSchema, value, HostRef.typeName);
        return new HostRef(parsed.name, parsed.ref);
    }

    static fromObject(host: Host): HostRef {
        return new HostRef(host.name, host.ref);
    }

    uniqueName(): string {
        return this.name;
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, ref: this.ref });
    }
}
