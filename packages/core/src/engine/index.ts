export * from "./worker-pool";
export * from "./check-invoker";
export * from "./result-aggregator";
export * from "./batch-runner";
export * from "./wire";
