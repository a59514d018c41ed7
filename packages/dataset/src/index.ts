export * from "./types";
export * from "./inMemory";
export * from "./postgres";
