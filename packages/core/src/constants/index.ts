/**
 * Constants module for @hostprobe/core.
 */

export * from "./defaults";
export * from "./public-resolvers";
