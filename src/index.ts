/**
 * Barrel exports.
 *
 * Re-exports the engine so consumers can import from `src`. The CLI and
 * server entrypoints are not included since importing them starts them.
 */
export * from "./types";
export * from "./traces";
export * from "./features";
export * from "./reading";
export * from "./arithmetic";
export * from "./handwriting";
export * from "./network";
export * from "./models";
export * from "./recommendations";
export * from "./summary";
export * from "./predictor";
export * from "./screening";
export { createApp } from "./app";
