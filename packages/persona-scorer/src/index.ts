export * from "./catalog";
export * from "./scorePersona";
