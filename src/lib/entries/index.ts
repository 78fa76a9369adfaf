export * from "./types";
export * from "./constants";
export * from "./errors";
export * from "./dates";
export * from "./id-table";
export * from "./entry-list";
export * from "./filtering";
export * from "./rebinding";
export * from "./sport-types";
