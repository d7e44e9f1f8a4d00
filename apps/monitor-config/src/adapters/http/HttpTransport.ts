/**
 * @fileoverview HTTP transport
 *
 * {@link Transport} implementation over axios. A session starts with a
 * login (`POST {url}/rest/login`) that returns a token; every later
 * request carries the username and token headers and goes to
 * `{url}/rest{path}`.
 *
 * Status handling: 200 returns the JSON body, every other status is
 * mapped to a {@link ClientError} subclass. Requests that never get a
 * response (DNS, TLS, timeout) fail with {@link HttpError}.
 *
 * @module adapters/http/HttpTransport
 */

import axios, {
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosResponse,
    type Method,
} from "axios";
import { Agent } from "https";
import {
    BadRequestError,
    ConfRestError,
    HttpError,
    InternalServerError,
    ResourceNotFoundError,
    UnauthorizedError,
    UndefinedHttpError,
    defaultLogger,
    type ClientLogger,
    type QueryParams,
    type Transport,
} from "@confrest/core";

/**
 * Connection settings
 */
export interface HttpTransportOptions {
    /** Server URL; `https://` is assumed when no scheme is given */
    readonly url: string;

    readonly username: string;

    readonly password: string;

    /** Accept self-signed or otherwise invalid TLS certificates */
    readonly ignoreCert?: boolean;

    /** Per-request timeout in milliseconds (default: 30000) */
    readonly timeoutMs?: number;

    readonly logger?: ClientLogger;

    /** Replaces axios' network adapter; tests use an in-process one */
    readonly adapter?: AxiosAdapter;
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Add `https://` when the URL has no scheme and drop trailing slashes.
 *
 * @example
 * ```typescript
 * normalizeBaseUrl("monitor.example.org/"); // "https://monitor.example.org"
 * ```
 */
export function normalizeBaseUrl(url: string): string {
    const withScheme = url.startsWith("https://") || url.startsWith("http://")
        ? url
        : `https://${url}`;
    return withScheme.replace(/\/+$/, "");
}

function toSearchParams(params?: QueryParams): URLSearchParams | undefined {
    if (params === undefined) {
        return undefined;
    }
    const search = new URLSearchParams();
    for (const [key, value] of params) {
        search.append(key, value);
    }
    return search;
}

function messageOf(data: unknown): string | undefined {
    if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
        return data.message;
    }
    return undefined;
}

/**
 * Map a response to its body or to the error for its status.
 */
export function interpretResponse(response: AxiosResponse<unknown>, path: string): unknown {
    switch (response.status) {
        case 200:
            return response.data;
        case 400:
            throw new BadRequestError(messageOf(response.data));
        case 401:
            throw new UnauthorizedError(messageOf(response.data));
        case 404:
            throw new ResourceNotFoundError(path);
        case 500:
            throw new InternalServerError(path);
        default:
            throw new UndefinedHttpError(response.status, messageOf(response.data));
    }
}

/**
 * Run an axios call, converting transport-level failures to HttpError.
 */
async function send(call: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
    try {
        return await call();
    }
    catch (error) {
        if (error instanceof ConfRestError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new HttpError(`Request failed: ${message}`, error);
    }
}

/**
 * Authenticated HTTP session with the configuration service.
 *
 * @example
 * ```typescript
 * const transport = await HttpTransport.connect({
 *     url     : "monitor.example.org",
 *     username: "admin",
 *     password: process.env.CONFREST_PASSWORD ?? "",
 * });
 *
 * const client = new ConfigClient({ transport });
 * // ...
 * await transport.logout();
 * ```
 */
export class HttpTransport implements Transport {
    private constructor(
        private readonly http: AxiosInstance,
        private readonly headers: Record<string, string>,
        private readonly logger: ClientLogger
    ) {}

    /**
     * Log in and return a transport bound to the session token.
     *
     * @throws UnauthorizedError if the login is refused or returns no token
     * @throws HttpError if the server cannot be reached
     */
    static async connect(options: HttpTransportOptions): Promise<HttpTransport> {
        const logger = options.logger ?? defaultLogger;
        const baseUrl = normalizeBaseUrl(options.url);

        const http = axios.create({
            baseURL       : `${baseUrl}/rest`,
            timeout       : options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            headers       : { "Content-Type": "application/json" },
            httpsAgent    : options.ignoreCert ? new Agent({ rejectUnauthorized: false }) : undefined,
            // Statuses are mapped by interpretResponse
            validateStatus: () => true,
            adapter       : options.adapter,
        });

        logger.info(`Logging in to ${baseUrl} as ${options.username}`);
        const response = await send(() => http.post("/login", {
            username: options.username,
            password: options.password,
        }));

        if (response.status !== 200) {
            throw new UnauthorizedError(`Failed to authenticate with status code: ${response.status}`);
        }

        const data: unknown = response.data;
        const token = typeof data === "object" && data !== null && "token" in data && typeof data.token === "string"
            ? data.token
            : undefined;
        if (token === undefined) {
            throw new UnauthorizedError("Token not found in response");
        }

        const headers = {
            "X-Opsview-Username": options.username,
            "X-Opsview-Token"   : token,
        };
        return new HttpTransport(http, headers, logger);
    }

    get(path: string, params?: QueryParams): Promise<unknown> {
        return this.request("get", path, params);
    }

    post(path: string, body: unknown): Promise<unknown> {
        return this.request("post", path, undefined, body);
    }

    put(path: string, body: unknown): Promise<unknown> {
        return this.request("put", path, undefined, body);
    }

    delete(path: string): Promise<unknown> {
        return this.request("delete", path);
    }

    /**
     * End the session on the server.
     */
    async logout(): Promise<unknown> {
        this.logger.info("Logging out");
        return this.post("/logout", null);
    }

    private async request(
        method: Method,
        path: string,
        params?: QueryParams,
        body?: unknown
    ): Promise<unknown> {
        this.logger.debug(`${method.toUpperCase()} ${path}`, {
            params: params?.map(([key, value]) => `${key}=${value}`).join("&"),
        });

        const response = await send(() => this.http.request<unknown>({
            method,
            url    : path,
            params : toSearchParams(params),
            data   : body,
            headers: this.headers,
        }));

        return interpretResponse(response, path);
    }
}
