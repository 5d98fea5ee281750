import path from "node:path";
import { writeJsonAtomic } from "../store/atomicFile";
import { Region } from "../types";

const ILLEGAL_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;
const MAX_TITLE_LENGTH = 120;

export function sanitizeTitle(title: string): string {
  const cleaned = title.replace(ILLEGAL_CHARACTERS, "_").replace(/\s+/g, " ").trim();
  return cleaned.slice(0, MAX_TITLE_LENGTH).trim();
}

/** Drops a leading year and region name so they are not repeated after the filename prefix. */
function stripRedundantPrefix(title: string, region: Region, year: number): string {
  let rest = title.replace(new RegExp(`^${year}年?度?`), "").trim();
  for (const variant of [...region.variants].sort((a, b) => b.length - a.length)) {
    if (rest.startsWith(variant)) {
      rest = rest.slice(variant.length).trim();
      break;
    }
  }
  return rest;
}

export interface ArtifactName {
  region: Region;
  year: number;
  title: string;
  extension: string;
}

/** `{downloads}/{region}/{year}{region}{title}{ext}`; the title falls back to "report". */
export function buildArtifactPath(downloadsDir: string, name: ArtifactName): string {
  const title = sanitizeTitle(stripRedundantPrefix(name.title, name.region, name.year)) || "report";
  const label = sanitizeTitle(name.region.name);
  const fileName = `${name.year}${label}${title}${name.extension.toLowerCase()}`;
  return path.join(downloadsDir, label, fileName);
}

/** `report.pdf`, then `report_2.pdf`, `report_3.pdf` for later collisions within one run. */
export function uniquePath(filePath: string, taken: Set<string>): string {
  const extension = path.extname(filePath);
  const stem = filePath.slice(0, filePath.length - extension.length);
  let candidate = filePath;
  let counter = 2;
  while (taken.has(candidate)) {
    candidate = `${stem}_${counter}${extension}`;
    counter += 1;
  }
  taken.add(candidate);
  return candidate;
}

export interface Provenance {
  url: string;
  sourcePageUrl: string;
  downloadedAt: string;
  bytes?: number;
  sha256?: string;
  contentType?: string;
}

export function provenancePath(filePath: string): string {
  return `${filePath}.source.json`;
}

export async function writeProvenance(filePath: string, provenance: Provenance): Promise<void> {
  await writeJsonAtomic(provenancePath(filePath), provenance);
}
