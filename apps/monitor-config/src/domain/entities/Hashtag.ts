/**
 * @fileoverview Hashtag entity
 *
 * Hashtags (called keywords on the wire, hence `/config/keyword`) group
 * hosts and service checks for dashboards and access control. Booleans
 * travel as `"0"`/`"1"` strings.
 *
 * @module domain/entities/Hashtag
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
import { validateDescription, validateHashtagName } from "../utils/validators.js";
import { HostRef } from "./HostRef.js";

export const HASHTAG_STYLES = [
    "group_by_host",
    "group_by_service",
    "host_summary",
    "errors_and_host_cells",
    "performance",
] as const;

/** Dashboard layout of a hashtag. */
export type HashtagStyle = typeof HASHTAG_STYLES[number];

// The service sends the string "null" for "no style"
const hashtagStyle = z
    .union([z.enum(HASHTAG_STYLES), z.literal("null"), z.null()])
    .optional()
    .transform((value) => (value === "null" || value === null ? undefined : value));

const hashtagSchema = z.object({
    name                 : z.string(),
    all_hosts            : wireOptionalBool,
    all_servicechecks    : wireOptionalBool,
    calculate_hard_states: wireOptionalBool,
    description          : wireOptionalString,
    enabled              : wireOptionalBool,
    exclude_handled      : wireOptionalBool,
    hosts                : z.unknown(),
    public               : wireOptionalBool,
    show_contextual_menus: wireOptionalBool,
    style                : hashtagStyle,
    id                   : wireOptionalUint,
    ref                  : wireOptionalString,
    uncommitted          : wireOptionalBool,
});

/**
 * Hashtag fields. Everything but the name is optional.
 */
export interface HashtagProps {
    name: string;
    allHosts?: boolean;
    allServicechecks?: boolean;
    calculateHardStates?: boolean;
    description?: string;
    enabled?: boolean;
    excludeHandled?: boolean;
    hosts?: ConfigRefMap<HostRef>;
    isPublic?: boolean;
    showContextualMenus?: boolean;
    style?: HashtagStyle;
    id?: number;
    ref?: string;
    uncommitted?: boolean;
}

/**
 * @example
 * ```typescript
 * const tag = Hashtag.builder()
 *     .name("web")
 *     .description("Public web tier")
 *     .enabled(true)
 *     .style("host_summary")
 *     .build();
 *
 * await tag.create(client);
 * ```
 */
export class Hashtag extends PersistentObject<Hashtag> {
    static readonly typeName = "Hashtag";
    static readonly configPath: string | null = "/config/keyword";

    name: string;
    allHosts?: boolean;
    allServicechecks?: boolean;
    calculateHardStates?: boolean;
    description?: string;
    enabled?: boolean;
    excludeHandled?: boolean;
    hosts?: ConfigRefMap<HostRef>;

    /** Sent as `public` */
    isPublic?: boolean;
    showContextualMenus?: boolean;
    style?: HashtagStyle;

    /** Set by the server when the hashtag has unapplied changes */
    uncommitted?: boolean;

    constructor(props: HashtagProps) {
        super();
        this.name = props.name;
        this.allHosts = props.allHosts;
        this.allServicechecks = props.allServicechecks;
        this.calculateHardStates = props.calculateHardStates;
        this.description = props.description;
        this.enabled = props.enabled;
        this.excludeHandled = props.excludeHandled;
        this.hosts = props.hosts;
        this.isPublic = props.isPublic;
        this.showContextualMenus = props.showContextualMenus;
        this.style = props.style;
        this.id = props.id;
        this.ref = props.ref;
        this.uncommitted = props.uncommitted;
    }

    static fromJSON(value: unknown): Hashtag {
        const raw = parseWire(hashtagSchema, value, Hashtag.typeName);
        return new Hashtag({
            name               : raw.name,
            allHosts           : raw.all_hosts,
            allServicechecks   : raw.all_servicechecks,
            calculateHardStates: raw.calculate_hard_states,
            description        : raw.description,
            enabled            : raw.enabled,
            excludeHandled     : raw.exclude_handled,
            hosts              : decodeOptional(raw.hosts, (hosts) => ConfigRefMap.fromJSON(HostRef, hosts, "hosts")),
            isPublic           : raw.public,
            showContextualMenus: raw.show_contextual_menus,
            style              : raw.style,
            id                 : raw.id,
            ref                : raw.ref,
            uncommitted        : raw.uncommitted,
        });
    }

    static builder(): HashtagBuilder {
        return new HashtagBuilder();
    }

    static minimal(name: string): Hashtag {
        return new Hashtag({ name: validateHashtagName(name) });
    }

    protected get codec(): ConfigCodec<Hashtag> {
        return Hashtag;
    }

    validatedName(name: string): string {
        return validateHashtagName(name);
    }

    clearReadonly(): void {
        super.clearReadonly();
        this.uncommitted = undefined;
    }

    toJSON(): WireObject {
        return omitUndefined({
            name                 : this.name,
            all_hosts            : encodeBool(this.allHosts),
            all_servicechecks    : encodeBool(this.allServicechecks),
            calculate_hard_states: encodeBool(this.calculateHardStates),
            description          : this.description,
            enabled              : encodeBool(this.enabled),
            exclude_handled      : encodeBool(this.excludeHandled),
            hosts                : this.hosts?.toJSON(),
            public               : encodeBool(this.isPublic),
            show_contextual_menus: encodeBool(this.showContextualMenus),
            style                : this.style,
            id                   : this.id,
            ref                  : this.ref,
            uncommitted          : encodeBool(this.uncommitted),
        });
    }
}

export class HashtagBuilder implements Builder<Hashtag> {
    private readonly props: Partial<HashtagProps> = {};

    name(name: string): this {
        this.props.name = name;
        return this;
    }

    allHosts(allHosts: boolean): this {
        this.props.allHosts = allHosts;
        return this;
    }

    allServicechecks(allServicechecks: boolean): this {
        this.props.allServicechecks = allServicechecks;
        return this;
    }

    calculateHardStates(calculateHardStates: boolean): this {
        this.props.calculateHardStates = calculateHardStates;
        return this;
    }

    description(description: string): this {
        this.props.description = description;
        return this;
    }

    enabled(enabled: boolean): this {
        this.props.enabled = enabled;
        return this;
    }

    excludeHandled(excludeHandled: boolean): this {
        this.props.excludeHandled = excludeHandled;
        return this;
    }

    hosts(hosts: ConfigRefMap<HostRef>): this {
        this.props.hosts = hosts;
        return this;
    }

    isPublic(isPublic: boolean): this {
        this.props.isPublic = isPublic;
        return this;
    }

    showContextualMenus(showContextualMenus: boolean): this {
        this.props.showContextualMenus = showContextualMenus;
        return this;
    }

    style(style: HashtagStyle): this {
        this.props.style = style;
        return this;
    }

    build(): Hashtag {
        const name = requireField(this.props.name, "name");
        return new Hashtag({
            ...this.props,
            name       : validateHashtagName(name),
            description: validateOptional(this.props.description, validateDescription),
        });
    }
}
