/**
 * @fileoverview Host template reference
 *
 * @module domain/entities/HostTemplateRef
 */

import * as z from "zod";
import {
    omitUndefined,
    parseWire,
    wireOptionalString,
    type ConfigRef,
    type WireObject,
} from "@confrest/core";
import type { HostTemplate } from "./HostTemplate.js";

const hostTemplateRefSchema = z.object({
    name: z.string(),
    ref : wireOptionalString,
});

export class HostTemplateRef implements ConfigRef {
    static readonly typeName = "HostTemplateRef";

    constructor(
        readonly name: string,
        readonly ref?: string
    ) {}

    static fromJSON(value: unknown): HostTemplateRef {
        const parsed = parseWire(hostTemplateRefSchema, value, HostTemplateRef.typeName);
        return new HostTemplateRef(parsed.name, parsed.ref);
    }

    static fromObject(template: HostTemplate): HostTemplateRef {
        return new HostTemplateRef(template.name, template.ref);
    }

    uniqueName(): string {
        return this.name;
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, ref: this.ref });
    }
}
