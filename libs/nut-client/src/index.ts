export { NutClient, type AuthenticateOptions, type ClientState, type NutClientDependencies } from "./client";
export { withNutSession, type NutSessionOptions } from "./session";
export { NutClientConfigSchema, type NutClientConfig, type NutClientConfigInput } from "./config";
export * from "./codec";
export * from "./error-codes";
export * from "./errors";
export * from "./logger";
