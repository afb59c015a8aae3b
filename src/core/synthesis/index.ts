export * from "./types";
export * from "./synthesis";
