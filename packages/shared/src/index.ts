export * from "./messages";
export * from "./digest";
