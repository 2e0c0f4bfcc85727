export * from "./config.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./exclusion.js";
export * from "./hierarchy.js";
export * from "./lock.js";
export * from "./logger.js";
export * from "./parsers/jsonl.js";
export * from "./parsers/message.js";
export * from "./parsers/toolInput.js";
export * from "./sessionManager.js";
export * from "./sessionTail.js";
export * from "./slots.js";
export * from "./snapshot.js";
export * from "./utils.js";
export * from "./watcher.js";
