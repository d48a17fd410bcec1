/**
 * Secret Sync - mirror a KVv2 secret tree onto local YAML files and back
 */

export const VERSION = "0.1.0";

export * from "./domain.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./path-translator.js";
export * from "./yaml-codec.js";
export * from "./diff-engine.js";
export * from "./preview-sink.js";
export * from "./remote-walker.js";
export * from "./local-walker.js";
export * from "./sync-engine.js";
export * from "./cli/program.js";
