export * from "./types";
export * from "./dsl";
export * from "./registry";
export * from "./query";
export * from "./validate";
