/**
 * @module interface
 * @description Provider contracts and the provider registry.
 */

export * from "./types.js";
export * from "./registry.js";
