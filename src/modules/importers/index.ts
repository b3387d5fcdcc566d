export * from "./opentdb";
export * from "./words";
