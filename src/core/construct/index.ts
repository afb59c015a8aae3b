export * from "./instance";
export * from "./typecheck";
export * from "./construct";
