export * from "./analyzeUsers";
export * from "./pipeline";
