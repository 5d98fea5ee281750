import { StoreError, describeError } from "../core/errors";
import { Logger } from "../observability";
import { SiteMapping } from "../types";
import { readJsonIfExists, writeJsonAtomic } from "./atomicFile";
import { fromPersisted, mergeSiteMapping, toPersisted } from "./merge";
import { MappingStore, PersistedSiteMapping } from "./types";

/**
 * `{ region: { gov, fin } }` JSON file. The file is read once; afterwards this instance is
 * the only writer. Each put merges in memory and queues a full snapshot write (temp file +
 * rename), and the queue keeps at most one write in flight.
 */
export class JsonMappingStore implements MappingStore {
  private readonly mappings = new Map<string, SiteMapping>();
  private writeChain: Promise<void> = Promise.resolve();
  private dirty = false;

  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger,
  ) {
    const raw = readJsonIfExists(filePath);
    if (raw === undefined) {
      return;
    }
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new StoreError(filePath, `site mapping file is not a JSON object: ${filePath}`);
    }
    for (const [region, value] of Object.entries(raw)) {
      this.mappings.set(region, fromPersisted(value));
    }
  }

  async get(region: string): Promise<SiteMapping | undefined> {
    const mapping = this.mappings.get(region);
    return mapping ? { ...mapping } : undefined;
  }

  async put(region: string, mapping: SiteMapping): Promise<SiteMapping> {
    const merged = mergeSiteMapping(this.mappings.get(region), mapping);
    this.mappings.set(region, merged);
    this.dirty = true;
    await this.scheduleWrite();
    return { ...merged };
  }

  async entries(): Promise<Record<string, SiteMapping>> {
    return Object.fromEntries(this.mappings);
  }

  async flush(): Promise<void> {
    if (this.dirty) {
      await this.scheduleWrite();
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private scheduleWrite(): Promise<void> {
    this.writeChain = this.writeChain.then(() => this.writeSnapshot());
    return this.writeChain;
  }

  private async writeSnapshot(): Promise<void> {
    if (!this.dirty) {
      return;
    }
    this.dirty = false;
    const snapshot: Record<string, PersistedSiteMapping> = {};
    for (const region of [...this.mappings.keys()].sort()) {
      const mapping = this.mappings.get(region);
      if (mapping) {
        snapshot[region] = toPersisted(mapping);
      }
    }

    try {
      await writeJsonAtomic(this.filePath, snapshot);
    } catch (error) {
      this.dirty = true;
      const storeError = new StoreError(this.filePath, `failed to write site mappings: ${describeError(error)}`);
      this.logger?.error("mapping_store_write_failed", { path: this.filePath, error: storeError.message });
    }
  }
}
