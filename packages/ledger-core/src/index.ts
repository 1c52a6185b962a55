export * from "./config";
export * from "./coordinator";
export * from "./deposit-verifier";
export * from "./errors";
export * from "./logger";
export * from "./pricing";
export * from "./reconciliation";
export * from "./retry-policy";
export * from "./services";
export * from "./vouchers";
