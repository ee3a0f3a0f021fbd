export * from "./body";
export * from "./client";
export * from "./config";
export * from "./env";
export * from "./errors";
export * from "./fetchTransport";
export * from "./logger";
export * from "./middleware";
export * from "./request";
export * from "./schemas";
export * from "./transport";
