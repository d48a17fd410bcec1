/**
 * KV Store Client - HTTP client for KVv2-style secret stores
 */

export const VERSION = "0.1.0";

export * from "./types.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./sensitive.js";
export * from "./core/base-client.js";
export * from "./core/request.js";
export * from "./auth/auth-handler.js";
export * from "./kv-client.js";
