import { SiteMapping } from "../types";

export type PersistedSiteMapping = { gov: string; fin: string };

export interface MappingStore {
  /** undefined means the region was never attempted; an entry with empty fields means attempted, not found. */
  get(region: string): Promise<SiteMapping | undefined>;
  /** Merges into the stored entry and returns the merged value. */
  put(region: string, mapping: SiteMapping): Promise<SiteMapping>;
  entries(): Promise<Record<string, SiteMapping>>;
  flush(): Promise<void>;
  close(): Promise<void>;
}
