export * from "./regionPipeline";
export * from "./runner";
