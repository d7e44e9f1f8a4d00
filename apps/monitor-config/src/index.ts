/**
 * @fileoverview Monitor Config - Main Entry Point
 *
 * Connects to a monitoring server's configuration API, fetches every
 * supported entity type and writes a JSON snapshot.
 *
 * Usage:
 *   monitor-config [--out snapshot.json]
 *
 * Without `--out` the snapshot is written to stdout. Connection settings
 * come from config/client.yml, overridden by CONFREST_* environment
 * variables (a .env file is loaded first).
 *
 * @module monitor-config
 */

// Load .env before anything reads the environment
import "dotenv/config";

import type { AxiosAdapter } from "axios";
import { writeFileSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

import {
    ConfigClient,
    MissingArgumentError,
    defaultLogger,
    type ClientLogger,
} from "@confrest/core";

import { HttpTransport } from "./adapters/http/index.js";
import { loadClientConfig, type ClientConfig } from "./config/index.js";
import { ConfigInstance } from "./instance/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const CONFIG_PATH = join(__dirname, "..", "config", "client.yml");

// Used when stdout carries the snapshot
const stderrLogger: ClientLogger = {
    debug: (msg, data) => console.error(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.error(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.error(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Parsed command line
 */
export interface CliOptions {
    /** Snapshot destination; stdout when unset */
    readonly outPath?: string;
}

/**
 * @throws MissingArgumentError if `--out` has no value
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const index = args.indexOf("--out");
    if (index === -1) {
        return {};
    }
    const outPath = args[index + 1];
    if (outPath === undefined || outPath.startsWith("--")) {
        throw new MissingArgumentError("--out");
    }
    return { outPath: resolve(outPath) };
}

/**
 * End the session. A failed logout is only logged, so it never replaces
 * the outcome of the work done in the session.
 */
async function endSession(transport: HttpTransport, logger: ClientLogger): Promise<void> {
    try {
        await transport.logout();
    }
    catch (error) {
        logger.warn("Logout failed", {
            error: error instanceof Error ? error.message : String(error),
        });
    }
}

/**
 * Connect, snapshot every collection and log out again. Logging out
 * happens even when the refresh fails; the refresh error is what the
 * caller sees.
 *
 * @param adapter - Replaces axios' network adapter (tests)
 */
export async function takeSnapshot(
    config: ClientConfig,
    logger: ClientLogger = defaultLogger,
    adapter?: AxiosAdapter
): Promise<ConfigInstance> {
    const transport = await HttpTransport.connect({ ...config, logger, adapter });
    const client = new ConfigClient({ transport, logger });

    try {
        return await ConfigInstance.empty().refresh(client, logger);
    }
    finally {
        await endSession(transport, logger);
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const options = parseCliArgs(process.argv.slice(2));
    const logger = options.outPath === undefined ? stderrLogger : defaultLogger;
    const config = loadClientConfig(CONFIG_PATH);

    const instance = await takeSnapshot(config, logger);
    const snapshot = JSON.stringify(instance, null, 2);

    if (options.outPath === undefined) {
        process.stdout.write(`${snapshot}\n`);
    }
    else {
        writeFileSync(options.outPath, `${snapshot}\n`, "utf-8");
        logger.info(`Snapshot written to ${options.outPath}`, instance.counts());
    }
}

// Run only when executed directly, not when imported by tests
if (process.argv[1] !== undefined && resolve(process.argv[1]) === __filename) {
    main().catch((error: unknown) => {
        stderrLogger.error("Snapshot failed", {
            error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
    });
}
