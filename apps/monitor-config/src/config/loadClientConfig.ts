/**
 * @fileoverview Client configuration loader
 *
 * Reads connection settings from a YAML file and lets environment
 * variables override them:
 *
 * | file key     | environment variable    |
 * |--------------|-------------------------|
 * | url          | CONFREST_URL            |
 * | username     | CONFREST_USERNAME       |
 * | password     | CONFREST_PASSWORD       |
 * | ignoreCert   | CONFREST_IGNORE_CERT    |
 * | timeoutMs    | CONFREST_TIMEOUT_MS     |
 *
 * The password is usually left out of the file and supplied through the
 * environment or a `.env` file.
 *
 * @module config/loadClientConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import * as z from "zod";
import {
    MissingArgumentError,
    parseWire,
    wireBool,
    wireUint,
} from "@confrest/core";
import { normalizeBaseUrl } from "../adapters/http/HttpTransport.js";

/**
 * Resolved connection settings
 */
export interface ClientConfig {
    /** Base URL with scheme and without trailing slash */
    readonly url: string;

    readonly username: string;

    readonly password: string;

    readonly ignoreCert: boolean;

    readonly timeoutMs: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

const clientFileSchema = z
    .object({
        url       : z.string().optional(),
        username  : z.string().optional(),
        password  : z.string().optional(),
        ignoreCert: z.boolean().optional(),
        timeoutMs : z.number().int().positive().optional(),
    })
    .nullish()
    .transform((value) => value ?? {});

type ClientFile = z.output<typeof clientFileSchema>;

function readClientFile(filePath: string): ClientFile {
    if (!existsSync(filePath)) {
        return {};
    }
    const content = readFileSync(filePath, "utf-8");
    return parseWire(clientFileSchema, parseYaml(content), filePath);
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === "" ? undefined : value;
}

function required(value: string | undefined, argument: string): string {
    if (value === undefined) {
        throw new MissingArgumentError(argument);
    }
    return value;
}

/**
 * Load connection settings.
 *
 * @param filePath - Path to client.yml; a missing file counts as empty
 * @param env - Environment to read overrides from
 * @throws MissingArgumentError if url, username or password is not set anywhere
 * @throws TypeParseError if the file or an override has the wrong type
 *
 * @example
 * ```typescript
 * const config = loadClientConfig("./config/client.yml");
 * const transport = await HttpTransport.connect(config);
 * ```
 */
export function loadClientConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const file = readClientFile(filePath);

    const url = required(nonEmpty(env.CONFREST_URL) ?? nonEmpty(file.url), "url");
    const username = required(nonEmpty(env.CONFREST_USERNAME) ?? nonEmpty(file.username), "username");
    const password = required(nonEmpty(env.CONFREST_PASSWORD) ?? nonEmpty(file.password), "password");

    const ignoreCertOverride = nonEmpty(env.CONFREST_IGNORE_CERT);
    const timeoutOverride = nonEmpty(env.CONFREST_TIMEOUT_MS);

    return {
        url       : normalizeBaseUrl(url),
        username,
        password,
        ignoreCert: ignoreCertOverride === undefined
            ? file.ignoreCert ?? false
            : parseWire(wireBool, ignoreCertOverride, "CONFREST_IGNORE_CERT"),
        timeoutMs: timeoutOverride === undefined
            ? file.timeoutMs ?? DEFAULT_TIMEOUT_MS
            : parseWire(wireUint, timeoutOverride, "CONFREST_TIMEOUT_MS"),
    };
}
