/**
 * @fileoverview Unit tests for typed collections
 *
 * Tests cover:
 * - Last-write-wins insertion
 * - Id-qualified unique names never collide
 * - drain / extend semantics
 * - Serialization to a plain array and decoding with duplicate detection
 * - Reference derivation and ConfigRefMap
 * - Key-set comparison
 *
 * @module @confrest/core/__tests__/ConfigObjectMap
 */

import { describe, it, expect } from "vitest";
import { ConfigObjectMap, refMapFrom } from "../collections/ConfigObjectMap.js";
import { ConfigRefMap } from "../collections/ConfigRefMap.js";
import { compareCollections } from "../collections/compare.js";
import { referenceOf } from "../contracts/ConfigRef.js";
import {
    DuplicateKeyError,
    NotAnArrayError,
    TypeParseError,
} from "../errors/ClientErrors.js";
import {
    Gadget,
    Widget,
    WidgetRef,
    captureError,
} from "./fixtures.js";

function widget(name: string, colour = "red", ref?: string): Widget {
    return new Widget({ name, colour, ref });
}

describe("ConfigObjectMap", () => {
    describe("add", () => {
        // Scenario: two entities with the same computed key
        it("should keep only the second value inserted under the same key", () => {
            const map = new ConfigObjectMap<Widget>();
            const first = widget("alpha", "red");
            const second = widget("alpha", "blue");

            map.add(first);
            map.add(second);

            expect(map.size).toBe(1);
            expect(map.get("alpha")).toBe(second);
        });

        it("should compute the key at insertion time", () => {
            const map = new ConfigObjectMap<Widget>();
            const item = widget("alpha");

            map.add(item);
            item.name = "beta";
            map.add(item);

            expect([...map.keys()].sort()).toEqual(["alpha", "beta"]);
        });

        it("should share the inserted instance", () => {
            const item = widget("alpha");
            const a = new ConfigObjectMap<Widget>([item]);
            const b = new ConfigObjectMap<Widget>([item]);

            expect(a.get("alpha")).toBe(b.get("alpha"));
        });

        it("should not collide when names repeat but ids differ", () => {
            const map = new ConfigObjectMap<Gadget>();

            map.add(new Gadget("probe", 1));
            map.add(new Gadget("probe", 2));

            expect(map.size).toBe(2);
            expect(map.has("probe-1")).toBe(true);
            expect(map.has("probe-2")).toBe(true);
        });

        it("should fall back to ref, then name, for unsaved id-qualified objects", () => {
            expect(new Gadget("probe", undefined, "/rest/config/gadget/9").uniqueName())
                .toBe("/rest/config/gadget/9");
            expect(new Gadget("probe").uniqueName()).toBe("probe");
        });
    });

    describe("access", () => {
        it("should report size, emptiness and membership", () => {
            const map = new ConfigObjectMap<Widget>();
            expect(map.isEmpty()).toBe(true);

            map.add(widget("alpha"));

            expect(map.isEmpty()).toBe(false);
            expect(map.has("alpha")).toBe(true);
            expect(map.has("beta")).toBe(false);
            expect(map.get("beta")).toBeUndefined();
        });

        it("should remove and return by key", () => {
            const item = widget("alpha");
            const map = new ConfigObjectMap<Widget>([item]);

            expect(map.remove("alpha")).toBe(item);
            expect(map.remove("alpha")).toBeUndefined();
            expect(map.size).toBe(0);
        });

        it("should iterate over values", () => {
            const map = new ConfigObjectMap<Widget>([widget("alpha"), widget("beta")]);

            const names = [...map].map((item) => item.name).sort();

            expect(names).toEqual(["alpha", "beta"]);
            expect(map.asArray()).toHaveLength(2);
        });
    });

    describe("drain and extend", () => {
        it("should empty the collection on drain", () => {
            const map = new ConfigObjectMap<Widget>([widget("alpha"), widget("beta")]);

            const drained = map.drain();

            expect(drained.map(([key]) => key).sort()).toEqual(["alpha", "beta"]);
            expect(map.isEmpty()).toBe(true);
        });

        it("should move every entry and let the source win on collision", () => {
            const target = new ConfigObjectMap<Widget>([widget("alpha", "red"), widget("beta")]);
            const replacement = widget("alpha", "blue");
            const source = new ConfigObjectMap<Widget>([replacement, widget("gamma")]);

            target.extend(source);

            expect(target.size).toBe(3);
            expect(target.get("alpha")).toBe(replacement);
            expect(source.isEmpty()).toBe(true);
        });
    });

    describe("serialization", () => {
        it("should serialize to a plain array without keys", () => {
            const map = new ConfigObjectMap<Widget>([widget("alpha")]);

            expect(map.toJSON()).toEqual([{ name: "alpha", colour: "red" }]);
            expect(JSON.stringify(map)).toBe("[{\"name\":\"alpha\",\"colour\":\"red\"}]");
        });

        it("should round-trip to an equal collection", () => {
            const map = new ConfigObjectMap<Widget>([widget("alpha"), widget("beta", "green")]);

            const decoded = ConfigObjectMap.fromJSON(Widget, JSON.parse(JSON.stringify(map)));

            expect(decoded.size).toBe(2);
            expect([...decoded.keys()].sort()).toEqual(["alpha", "beta"]);
            expect(decoded.equals(map)).toBe(true);
        });

        // Scenario: remote data contains two elements with the same computed key
        it("should reject duplicate keys instead of overwriting", () => {
            const error = captureError(() => ConfigObjectMap.fromJSON(Widget, [
                { name: "alpha", colour: "red" },
                { name: "alpha", colour: "blue" },
            ]));

            expect(error).toBeInstanceOf(DuplicateKeyError);
            expect(error).toMatchObject({ key: "alpha" });
        });

        it("should accept repeated names when the unique name is id-qualified", () => {
            const decoded = ConfigObjectMap.fromJSON(Gadget, [
                { name: "probe", id: "1" },
                { name: "probe", id: 2 },
            ]);

            expect([...decoded.keys()].sort()).toEqual(["probe-1", "probe-2"]);
        });

        it("should reject a non-array value", () => {
            expect(() => ConfigObjectMap.fromJSON(Widget, { name: "alpha" })).toThrow(NotAnArrayError);
        });

        it("should surface element decoding failures", () => {
            expect(() => ConfigObjectMap.fromJSON(Widget, [{ colour: "red" }])).toThrow(TypeParseError);
        });
    });

    describe("equals", () => {
        it("should compare key sets and wire values", () => {
            const a = new ConfigObjectMap<Widget>([widget("alpha", "red")]);
            const b = new ConfigObjectMap<Widget>([widget("alpha", "red")]);
            const c = new ConfigObjectMap<Widget>([widget("alpha", "blue")]);
            const d = new ConfigObjectMap<Widget>([widget("beta", "red")]);

            expect(a.equals(b)).toBe(true);
            expect(a.equals(c)).toBe(false);
            expect(a.equals(d)).toBe(false);
        });
    });
});

describe("reference derivation", () => {
    it("should copy name and ref", () => {
        const full = widget("alpha", "red", "/rest/config/widget/3");

        const ref = referenceOf(WidgetRef, full);

        expect(ref.name).toBe(full.name);
        expect(ref.ref).toBe(full.ref);
    });

    it("should build a ref map without touching the source", () => {
        const objects = new ConfigObjectMap<Widget>([
            widget("alpha", "red", "/rest/config/widget/1"),
            widget("beta", "red", "/rest/config/widget/2"),
        ]);

        const refs = refMapFrom(objects, WidgetRef);

        expect(refs).toBeInstanceOf(ConfigRefMap);
        expect(refs.size).toBe(2);
        expect(refs.get("beta")?.ref).toBe("/rest/config/widget/2");
        expect(objects.size).toBe(2);
        expect(objects.get("alpha")).toBeInstanceOf(Widget);
    });

    it("should serialize references as name and ref only", () => {
        const refs = ConfigRefMap.fromObjects(WidgetRef, [widget("alpha", "red", "/rest/config/widget/1")]);

        expect(refs.toJSON()).toEqual([{ name: "alpha", ref: "/rest/config/widget/1" }]);
    });

    it("should reject duplicate references on decode", () => {
        expect(() => ConfigRefMap.fromJSON(WidgetRef, [{ name: "alpha" }, { name: "alpha" }]))
            .toThrow(DuplicateKeyError);
    });
});

describe("compareCollections", () => {
    it("should split keys into exclusive and common sets", () => {
        const a = new ConfigObjectMap<Widget>([widget("one"), widget("two")]);
        const b = new ConfigObjectMap<Widget>([widget("two"), widget("three")]);

        const { aExclusive, bExclusive, common } = compareCollections(a, b);

        expect([...aExclusive]).toEqual(["one"]);
        expect([...bExclusive]).toEqual(["three"]);
        expect([...common]).toEqual(["two"]);
    });
});
