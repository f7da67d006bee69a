export * from "./types";
export * from "./errors";
export * from "./fees";
export * from "./hashing";
export * from "./verifier";
export * from "./token-ledger";
export * from "./chain";
export * from "./events";
export * from "./hooks";
export * from "./permit";
export * from "./store";
export * from "./router";
export * from "./upgrade-controller";
export * from "./proxy";
export * from "./deploy";
export * from "./wire";
