/**
 * @fileoverview HTTP adapter barrel exports
 *
 * @module adapters/http
 */

export {
    HttpTransport,
    interpretResponse,
    normalizeBaseUrl,
    type HttpTransportOptions,
} from "./HttpTransport.js";
