import { normalizeRoot } from "../core/url";
import { SiteMapping } from "../types";
import { PersistedSiteMapping } from "./types";

function cleanRoot(value: string | undefined): string | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return normalizeRoot(value.trim());
}

export function normalizeSiteMapping(mapping: SiteMapping): SiteMapping {
  const result: SiteMapping = {};
  const gov = cleanRoot(mapping.gov);
  const fin = cleanRoot(mapping.fin);
  if (gov) {
    result.gov = gov;
  }
  if (fin) {
    result.fin = fin;
  }
  return result;
}

/** An empty incoming field never clears a known value; a non-empty one replaces it. */
export function mergeSiteMapping(existing: SiteMapping | undefined, incoming: SiteMapping): SiteMapping {
  const next = normalizeSiteMapping(incoming);
  const previous = existing ? normalizeSiteMapping(existing) : {};
  return normalizeSiteMapping({
    gov: next.gov ?? previous.gov,
    fin: next.fin ?? previous.fin,
  });
}

export function toPersisted(mapping: SiteMapping): PersistedSiteMapping {
  return { gov: mapping.gov ?? "", fin: mapping.fin ?? "" };
}

export function fromPersisted(value: unknown): SiteMapping {
  if (typeof value !== "object" || value === null) {
    return {};
  }
  const gov = "gov" in value && typeof value.gov === "string" ? value.gov : undefined;
  const fin = "fin" in value && typeof value.fin === "string" ? value.fin : undefined;
  return normalizeSiteMapping({ gov, fin });
}

export function hasAnyRoot(mapping: SiteMapping): boolean {
  return Boolean(mapping.gov || mapping.fin);
}
