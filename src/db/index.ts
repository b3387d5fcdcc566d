/**
 * Data layer entrypoint: pool, schema bootstrap and repositories.
 */
export * from "./client";
export * from "./init";
export * from "./normalizers";

export * from "./repositories/questions";
export * from "./repositories/scramble-words";
export * from "./repositories/scores";
