/**
 * @fileoverview Unit tests for HostTemplate and its management URLs
 *
 * Tests cover:
 * - Management URL keys built from name and URL suffix
 * - Embedded management URLs decoding and encoding
 * - Management URLs cannot be sent on their own
 *
 * @module __tests__/HostTemplate
 */

import { describe, it, expect } from "vitest";
import {
    ConfigClient,
    ConfigObjectMap,
    DoesNotMatchRegexError,
    NoConfigPathError,
    RequiredFieldEmptyError,
} from "@confrest/core";
import { HostTemplate } from "../domain/entities/HostTemplate.js";
import { ManagementUrl } from "../domain/entities/ManagementUrl.js";
import { createMockLogger, createMockTransport } from "./fixtures.js";

describe("ManagementUrl", () => {
    describe("uniqueName", () => {
        it("should append the last five characters of the URL", () => {
            const url = new ManagementUrl({ name: "SSH", url: "ssh://$HOSTADDRESS$" });

            expect(url.uniqueName()).toBe("SSHRESS$");
        });

        it("should append a short URL whole", () => {
            expect(new ManagementUrl({ name: "SSH", url: "x:/" }).uniqueName()).toBe("SSHx:/");
        });

        it("should use the name alone without a URL", () => {
            expect(new ManagementUrl({ name: "SSH" }).uniqueName()).toBe("SSH");
        });
    });

    describe("builder", () => {
        it("should require a URL", () => {
            expect(() => ManagementUrl.builder().name("SSH").build()).toThrow(new RequiredFieldEmptyError("url"));
        });

        it("should validate the URL", () => {
            const builder = ManagementUrl.builder().name("SSH").url("$HOSTADDRESS$");

            expect(() => builder.build()).toThrow(DoesNotMatchRegexError);
        });

        it("should build a trimmed name and the URL as given", () => {
            const url = ManagementUrl.builder().name(" SSH ").url("ssh://$HOSTADDRESS$").build();

            expect(url.toJSON()).toEqual({ name: "SSH", url: "ssh://$HOSTADDRESS$" });
        });
    });

    it("should refuse to be created on its own", async () => {
        const transport = createMockTransport();
        const client = new ConfigClient({ transport, logger: createMockLogger() });

        const url = new ManagementUrl({ name: "SSH", url: "ssh://$HOSTADDRESS$" });

        await expect(client.postNewObjectConfig(ManagementUrl, url)).rejects.toThrow(NoConfigPathError);
        expect(transport.post).not.toHaveBeenCalled();
    });
});

describe("HostTemplate", () => {
    // Scenario: two management URLs share a name but not a URL
    it("should decode same-named management URLs under distinct keys", () => {
        const template = HostTemplate.fromJSON({
            name          : "Network - Base",
            has_icon      : 1,
            managementurls: [
                { name: "Remote", url: "ssh://$HOSTADDRESS$", id: "3" },
                { name: "Remote", url: "telnet://$HOSTADDRESS$:23" },
            ],
            id : "2",
            ref: "/rest/config/hosttemplate/2",
        });

        expect(template.managementUrls?.size).toBe(2);
        expect([...(template.managementUrls?.keys() ?? [])].sort()).toEqual(["RemoteRESS$", "RemoteS$:23"]);
        expect(template.managementUrls?.get("RemoteRESS$")?.id).toBe(3);
        expect(template.hasIcon).toBe(1);
    });

    it("should encode management URLs under managementurls", () => {
        const template = HostTemplate.builder()
            .name("Network - Base")
            .description("Base checks")
            .managementUrls(new ConfigObjectMap<ManagementUrl>([
                new ManagementUrl({ name: "SSH", url: "ssh://$HOSTADDRESS$" }),
            ]))
            .build();

        expect(template.toJSON()).toEqual({
            name          : "Network - Base",
            description   : "Base checks",
            managementurls: [{ name: "SSH", url: "ssh://$HOSTADDRESS$" }],
        });
    });

    it("should clear the icon flag with the other read-only fields", () => {
        const template = HostTemplate.fromJSON({ name: "Base", has_icon: "1", id: "2", uncommitted: "1" });

        template.clearReadonly();

        expect(template.toJSON()).toEqual({ name: "Base" });
    });

    it("should reject slashes in the name", () => {
        expect(() => HostTemplate.minimal("Network/Base")).toThrow(DoesNotMatchRegexError);
    });
});
