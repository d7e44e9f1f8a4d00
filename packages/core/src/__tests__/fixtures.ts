/**
 * @fileoverview Test fixtures
 *
 * Small entity types that exercise the framework without depending on
 * any real domain package:
 * - Widget: persistent, unique by name
 * - Gadget: persistent, names not unique (key is name-id, else ref, else name)
 * - Part: embedded-only, no config path
 * - WidgetRef: reference variant of Widget
 *
 * @module @confrest/core/__tests__/fixtures
 */

import * as z from "zod";
import { vi } from "vitest";
import type { Builder } from "../contracts/Builder.js";
import type { ConfigCodec, ConfigObject } from "../contracts/ConfigObject.js";
import type { ConfigRef } from "../contracts/ConfigRef.js";
import type { ClientLogger } from "../contracts/Logger.js";
import { PersistentObject } from "../contracts/Persistent.js";
import type { QueryParams, Transport } from "../contracts/Transport.js";
import {
    encodeBool,
    omitUndefined,
    parseWire,
    wireOptionalBool,
    wireOptionalString,
    wireOptionalUint,
    type WireObject,
} from "../wire/codec.js";
import { requireField, validateTrimmedString } from "../validation/validators.js";

const NAME_RULE = { min: 1, max: 64, pattern: /^[\p{L}\p{N}][\p{L}\p{N} _-]*$/u };

// ============================================================================
// Widget
// ============================================================================

interface WidgetProps {
    name: string;
    colour?: string;
    enabled?: boolean;
    id?: number;
    ref?: string;
}

const widgetSchema = z.object({
    name   : z.string(),
    colour : wireOptionalString,
    enabled: wireOptionalBool,
    id     : wireOptionalUint,
    ref    : wireOptionalString,
});

export class Widget extends PersistentObject<Widget> {
    static readonly typeName = "Widget";
    static readonly configPath: string | null = "/config/widget";

    name: string;
    colour?: string;
    enabled?: boolean;

    constructor(props: WidgetProps) {
        super();
        this.name = props.name;
        this.colour = props.colour;
        this.enabled = props.enabled;
        this.id = props.id;
        this.ref = props.ref;
    }

    static fromJSON(value: unknown): Widget {
        return new Widget(parseWire(widgetSchema, value, Widget.typeName));
    }

    static builder(): WidgetBuilder {
        return new WidgetBuilder();
    }

    static minimal(name: string): Widget {
        return Widget.builder().name(name).build();
    }

    protected get codec(): ConfigCodec<Widget> {
        return Widget;
    }

    validatedName(name: string): string {
        return validateTrimmedString(name, NAME_RULE);
    }

    toJSON(): WireObject {
        return omitUndefined({
            name   : this.name,
            colour : this.colour,
            enabled: encodeBool(this.enabled),
            id     : this.id,
            ref    : this.ref,
        });
    }
}

export class WidgetBuilder implements Builder<Widget> {
    private nameValue?: string;
    private colourValue?: string;
    private enabledValue?: boolean;

    name(name: string): this {
        this.nameValue = name;
        return this;
    }

    colour(colour: string): this {
        this.colourValue = colour;
        return this;
    }

    enabled(enabled: boolean): this {
        this.enabledValue = enabled;
        return this;
    }

    build(): Widget {
        const name = requireField(this.nameValue, "name");
        const colour = requireField(this.colourValue, "colour");
        return new Widget({
            name   : validateTrimmedString(name, NAME_RULE),
            colour,
            enabled: this.enabledValue,
        });
    }
}

// ============================================================================
// WidgetRef
// ============================================================================

const widgetRefSchema = z.object({
    name: z.string(),
    ref : wireOptionalString,
});

export class WidgetRef implements ConfigRef {
    static readonly typeName = "WidgetRef";

    constructor(
        readonly name: string,
        readonly ref?: string
    ) {}

    static fromJSON(value: unknown): WidgetRef {
        const parsed = parseWire(widgetRefSchema, value, WidgetRef.typeName);
        return new WidgetRef(parsed.name, parsed.ref);
    }

    static fromObject(widget: Widget): WidgetRef {
        return new WidgetRef(widget.name, widget.ref);
    }

    uniqueName(): string {
        return this.name;
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, ref: this.ref });
    }
}

// ============================================================================
// Gadget
// ============================================================================

const gadgetSchema = z.object({
    name: z.string(),
    id  : wireOptionalUint,
    ref : wireOptionalString,
});

export class Gadget extends PersistentObject<Gadget> {
    static readonly typeName = "Gadget";
    static readonly configPath: string | null = "/config/gadget";

    name: string;

    constructor(name: string, id?: number, ref?: string) {
        super();
        this.name = name;
        this.id = id;
        this.ref = ref;
    }

    static fromJSON(value: unknown): Gadget {
        const parsed = parseWire(gadgetSchema, value, Gadget.typeName);
        return new Gadget(parsed.name, parsed.id, parsed.ref);
    }

    protected get codec(): ConfigCodec<Gadget> {
        return Gadget;
    }

    /** Names are not unique on the server */
    uniqueName(): string {
        if (this.id !== undefined) {
            return `${this.name}-${this.id}`;
        }
        return this.ref ?? this.name;
    }

    validatedName(name: string): string {
        return validateTrimmedString(name, NAME_RULE);
    }

    toJSON(): WireObject {
        return omitUndefined({ name: this.name, id: this.id, ref: this.ref });
    }
}

// ============================================================================
// Part (embedded only)
// ============================================================================

export class Part implements ConfigObject {
    static readonly typeName = "Part";
    static readonly configPath: string | null = null;

    constructor(readonly name: string) {}

    static fromJSON(value: unknown): Part {
        return new Part(parseWire(z.object({ name: z.string() }), value, Part.typeName).name);
    }

    uniqueName(): string {
        return this.name;
    }

    toJSON(): WireObject {
        return { name: this.name };
    }
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Transport whose every verb is a spy, so tests can script responses
 * and assert on (or the absence of) requests.
 */
export function createMockTransport() {
    return {
        get   : vi.fn(async (_path: string, _params?: QueryParams): Promise<unknown> => ({})),
        post  : vi.fn(async (_path: string, _body: unknown): Promise<unknown> => ({})),
        put   : vi.fn(async (_path: string, _body: unknown): Promise<unknown> => ({})),
        delete: vi.fn(async (_path: string): Promise<unknown> => ({})),
    } satisfies Transport;
}

/**
 * Logger that records instead of printing.
 */
export function createSilentLogger(): ClientLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * One page of a list response.
 */
export function page(items: unknown[], totalRows: number, totalPages: number): unknown {
    return {
        list   : items,
        summary: {
            rows      : String(items.length),
            totalrows : String(totalRows),
            totalpages: String(totalPages),
        },
    };
}

/**
 * `count` wire widgets named `${prefix}-${n}`, starting at `start`.
 */
export function wireWidgets(prefix: string, count: number, start = 1): WireObject[] {
    return Array.from({ length: count }, (_, index) => ({
        name   : `${prefix}-${start + index}`,
        colour : "red",
        enabled: "1",
        id     : String(start + index),
        ref    : `/rest/config/widget/${start + index}`,
    }));
}

/**
 * Run `fn` and return what it threw, or undefined.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    }
    catch (error) {
        return error;
    }
    return undefined;
}

/**
 * Await `promise` and return its rejection reason, or undefined.
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    }
    catch (error) {
        return error;
    }
    return undefined;
}
