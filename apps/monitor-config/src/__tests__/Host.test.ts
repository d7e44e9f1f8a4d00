/**
 * @fileoverview Unit tests for the Host entity
 *
 * Tests cover:
 * - Builder required fields, in order
 * - Address and alias validation
 * - Name-only minimal hosts
 * - Wire decoding of template and parent references
 *
 * @module __tests__/Host
 */

import { describe, it, expect } from "vitest";
import {
    ConfigRefMap,
    DoesNotMatchRegexError,
    InvalidIpError,
    RequiredFieldEmptyError,
} from "@confrest/core";
import { Host } from "../domain/entities/Host.js";
import { HostGroupRef } from "../domain/entities/HostGroupRef.js";
import { HostRef } from "../domain/entities/HostRef.js";
import { HostTemplateRef } from "../domain/entities/HostTemplateRef.js";

const WEB_GROUP = new HostGroupRef("Web", "Opsview,Web,");

describe("Host", () => {
    describe("builder", () => {
        it("should require name, then ip, then hostgroup", () => {
            expect(() => Host.builder().build()).toThrow(new RequiredFieldEmptyError("name"));
            expect(() => Host.builder().name("web-01").build()).toThrow(new RequiredFieldEmptyError("ip"));
            expect(() => Host.builder().name("web-01").ip("10.0.0.11").build())
                .toThrow(new RequiredFieldEmptyError("hostgroup"));
        });

        it("should build a host with its group and templates", () => {
            const host = Host.builder()
                .name("web-01")
                .ip("10.0.0.11 ")
                .alias("Frontend node")
                .hostgroup(WEB_GROUP)
                .hosttemplates(new ConfigRefMap<HostTemplateRef>([new HostTemplateRef("Network - Base")]))
                .build();

            expect(host.toJSON()).toEqual({
                name         : "web-01",
                ip           : "10.0.0.11",
                alias        : "Frontend node",
                hostgroup    : { name: "Web", matpath: "Opsview,Web," },
                hosttemplates: [{ name: "Network - Base" }],
            });
        });

        it("should accept a hostname as the address", () => {
            const host = Host.builder().name("web-01").ip("web-01.example.org").hostgroup(WEB_GROUP).build();

            expect(host.ip).toBe("web-01.example.org");
        });

        it("should reject an invalid address", () => {
            const builder = Host.builder().name("web-01").ip("not a host").hostgroup(WEB_GROUP);

            expect(() => builder.build()).toThrow(InvalidIpError);
        });

        it("should reject an invalid name before checking the address", () => {
            const builder = Host.builder().name("web 01").ip("not a host").hostgroup(WEB_GROUP);

            expect(() => builder.build()).toThrow(DoesNotMatchRegexError);
        });
    });

    describe("minimal", () => {
        it("should hold only the validated name", () => {
            expect(Host.minimal(" web-01 ").toJSON()).toEqual({ name: "web-01" });
        });

        it("should reject an invalid name", () => {
            expect(() => Host.minimal("web 01")).toThrow(DoesNotMatchRegexError);
        });
    });

    describe("fromJSON", () => {
        it("should decode references and read-only fields", () => {
            const host = Host.fromJSON({
                name         : "web-02",
                ip           : "10.0.0.12",
                hostgroup    : { name: "Web", matpath: "Opsview,Web,", ref: "/rest/config/hostgroup/4" },
                hosttemplates: [{ name: "Network - Base", ref: "/rest/config/hosttemplate/2" }],
                parents      : [{ name: "core-switch", ref: "/rest/config/host/9" }],
                id           : "12",
                last_updated : "1700000000",
                ref          : "/rest/config/host/12",
                uncommitted  : "0",
            });

            expect(host.hostgroup?.uniqueName()).toBe("Opsview,Web,");
            expect(host.hosttemplates?.has("Network - Base")).toBe(true);
            expect(host.parents?.get("core-switch")?.ref).toBe("/rest/config/host/9");
            expect(host.lastUpdated).toBe(1700000000);

            host.clearReadonly();

            expect(host.lastUpdated).toBeUndefined();
            expect(host.uncommitted).toBeUndefined();
            expect(host.id).toBeUndefined();
        });
    });

    describe("HostRef", () => {
        it("should reference a host by name and ref", () => {
            const host = Host.fromJSON({ name: "web-01", ref: "/rest/config/host/1" });

            expect(HostRef.fromObject(host).toJSON()).toEqual({ name: "web-01", ref: "/rest/config/host/1" });
        });
    });
});
