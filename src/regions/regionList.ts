import fs from "node:fs";
import path from "node:path";

/** Reads the region list: a JSON array of names, or an object with a `regions` array. */
export function loadRegionList(filePath: string): string[] {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Region list not found: ${absolutePath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  const list = Array.isArray(parsed) ? parsed : isRegionsObject(parsed) ? parsed.regions : undefined;
  if (!list) {
    throw new Error(`Region list must be a JSON array of names: ${absolutePath}`);
  }

  const names: string[] = [];
  const seen = new Set<string>();
  for (const entry of list) {
    if (typeof entry !== "string" || entry.trim().length === 0) {
      continue;
    }
    const name = entry.trim();
    if (!seen.has(name)) {
      seen.add(name);
      names.push(name);
    }
  }
  return names;
}

function isRegionsObject(value: unknown): value is { regions: unknown[] } {
  return (
    typeof value === "object" &&
    value !== null &&
    "regions" in value &&
    Array.isArray(value.regions)
  );
}
