export * from "./parse";
export * from "./extractFeatures";
