import { SiteMapping } from "../types";
import { mergeSiteMapping } from "./merge";
import { MappingStore } from "./types";

export class InMemoryMappingStore implements MappingStore {
  private readonly mappings = new Map<string, SiteMapping>();

  constructor(seed: Record<string, SiteMapping> = {}) {
    for (const [region, mapping] of Object.entries(seed)) {
      this.mappings.set(region, mergeSiteMapping(undefined, mapping));
    }
  }

  async get(region: string): Promise<SiteMapping | undefined> {
    const mapping = this.mappings.get(region);
    return mapping ? { ...mapping } : undefined;
  }

  async put(region: string, mapping: SiteMapping): Promise<SiteMapping> {
    const merged = mergeSiteMapping(this.mappings.get(region), mapping);
    this.mappings.set(region, merged);
    return { ...merged };
  }

  async entries(): Promise<Record<string, SiteMapping>> {
    return Object.fromEntries(this.mappings);
  }

  async flush(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }
}
