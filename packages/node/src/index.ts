/**
 * @cosign/node — HTTP surface for the multisig engine.
 *
 * @packageDocumentation
 */

export { MultisigService } from "./services/multisig-service.js";
export type { MultisigServiceConfig } from "./services/multisig-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, DEFAULT_LIMITS } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
