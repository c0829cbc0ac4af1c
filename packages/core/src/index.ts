export * from "./types.js";
export * from "./interfaces.js";
export * from "./errors.js";
export { Registry, type Factory, type RegistryOptions } from "./registry.js";
export { hashConfig, canonicalJson, runId } from "./hash.js";
export { SeededRng } from "./rng.js";
