export * from "./errors";
export * from "./timeline";
export * from "./types";
