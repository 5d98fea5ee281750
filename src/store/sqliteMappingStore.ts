import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { SiteMapping } from "../types";
import { fromPersisted, mergeSiteMapping, toPersisted } from "./merge";
import { MappingStore } from "./types";

type MappingRow = {
  region: string;
  gov: string;
  fin: string;
};

/**
 * SQLite-backed mapping store. The merge rule lives in the upsert itself, so two writers
 * racing on the same region cannot clear each other's fields.
 */
export class SqliteMappingStore implements MappingStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async get(region: string): Promise<SiteMapping | undefined> {
    const row = this.db
      .prepare<[string], MappingRow>("SELECT region, gov, fin FROM site_mappings WHERE region = ?")
      .get(region);
    return row ? fromPersisted(row) : undefined;
  }

  async put(region: string, mapping: SiteMapping): Promise<SiteMapping> {
    const persisted = toPersisted(mergeSiteMapping(undefined, mapping));
    this.db
      .prepare(
        `
        INSERT INTO site_mappings (region, gov, fin, updatedAt)
        VALUES (@region, @gov, @fin, @updatedAt)
        ON CONFLICT(region) DO UPDATE SET
          gov = CASE WHEN excluded.gov <> '' THEN excluded.gov ELSE site_mappings.gov END,
          fin = CASE WHEN excluded.fin <> '' THEN excluded.fin ELSE site_mappings.fin END,
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        region,
        gov: persisted.gov,
        fin: persisted.fin,
        updatedAt: new Date().toISOString(),
      });
    return (await this.get(region)) ?? {};
  }

  async entries(): Promise<Record<string, SiteMapping>> {
    const rows = this.db
      .prepare<[], MappingRow>("SELECT region, gov, fin FROM site_mappings ORDER BY region")
      .all();
    const result: Record<string, SiteMapping> = {};
    for (const row of rows) {
      result[row.region] = fromPersisted(row);
    }
    return result;
  }

  async flush(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS site_mappings (
        region TEXT PRIMARY KEY,
        gov TEXT NOT NULL DEFAULT '',
        fin TEXT NOT NULL DEFAULT '',
        updatedAt TEXT NOT NULL
      );
    `);
  }
}
