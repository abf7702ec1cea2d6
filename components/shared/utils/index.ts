/**
 * Shared utilities: logging, errors and network arithmetic
 */

export * from "./logging";
export * from "./error-handling";
export * from "./cidr";
export * from "./aws-helpers";
