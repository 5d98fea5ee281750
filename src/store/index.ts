import { AppConfig } from "../config";
import { Logger } from "../observability";
import { JsonMappingStore } from "./jsonMappingStore";
import { SqliteMappingStore } from "./sqliteMappingStore";
import { MappingStore } from "./types";

export function createMappingStore(config: AppConfig, logger?: Logger): MappingStore {
  switch (config.mappingStore.driver) {
    case "sqlite":
      return new SqliteMappingStore(config.mappingStore.path);
    case "json":
      return new JsonMappingStore(config.mappingStore.path, logger);
    default:
      throw new Error(`Unsupported mapping store driver: ${String(config.mappingStore.driver)}`);
  }
}

export * from "./types";
export * from "./merge";
export * from "./progressStore";
export { InMemoryMappingStore } from "./memoryMappingStore";
export { JsonMappingStore } from "./jsonMappingStore";
export { SqliteMappingStore } from "./sqliteMappingStore";
