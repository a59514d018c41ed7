export * from "./classes";
export * from "./personaViewModel";
