export * from "./errors";
export * from "./maze";
export * from "./path";
export * from "./render";
export * from "./solve";
