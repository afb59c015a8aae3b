export * from "./types";
export * from "./cell";
