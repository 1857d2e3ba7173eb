export * from "./errors";
export * from "./outcome";
export * from "./request";
export * from "./config";
export * from "./logger";
export * from "./constants";
export * from "./checks";
export * from "./engine";

export const HOSTPROBE_VERSION = "0.1.0";
