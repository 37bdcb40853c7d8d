// @scopegate/core - credential, scope and access-cache primitives

export * from "./errors.js";
export * from "./credentials.js";
export * from "./scopes.js";
export * from "./operation-scopes.js";
export * from "./access-cache.js";
export * from "./ring-buffer.js";
export * from "./events.js";
export * from "./emitter.js";
