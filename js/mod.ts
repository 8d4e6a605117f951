export type * from "./types/core.js";
export type * from "./types/iface.js";
export type * from "./types/pattern.js";

export * from "./lib/config-file.js";
export * from "./lib/content.js";
export * from "./lib/control.js";
export * from "./lib/env.js";
export * from "./lib/errors.js";
export * from "./lib/gql-transport.js";
export * from "./lib/gqlclient.js";
export * from "./lib/logger.js";
export * from "./lib/pattern.js";
export * from "./lib/push-loop.js";
export * from "./lib/registration.js";
export * from "./lib/run-controller.js";
export * from "./lib/run-state.js";
export * from "./lib/signer.js";
export * from "./lib/signing-info.js";
export * from "./lib/stats.js";
export type * from "./lib/transport.js";
