export * from "./strings";
export * from "./time";
export * from "./types";
