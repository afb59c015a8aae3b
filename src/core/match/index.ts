export * from "./types";
export * from "./clauses";
export * from "./compiler";
export * from "./dispatch";
