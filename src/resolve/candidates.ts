import { pinyin } from "pinyin-pro";
import { err, ok, Result } from "../core/result";
import { ResolutionError } from "../core/errors";
import provincePrefixes from "../data/provincePrefixes.json";
import { Region, SiteKind, Transliteration } from "../types";

const FINANCE_SUBDOMAINS = ["czj", "cz", "mof"] as const;
const LATIN_LABEL = /^[a-z]+$/;

export function transliterate(region: Region): Transliteration | undefined {
  const base = region.baseName;
  if (!base) {
    return undefined;
  }

  const full = pinyin(base, { toneType: "none", type: "array", v: true }).join("").toLowerCase();
  const abbr = pinyin(base, { pattern: "first", toneType: "none", type: "array" }).join("").toLowerCase();
  if (!LATIN_LABEL.test(full) || !LATIN_LABEL.test(abbr)) {
    return undefined;
  }
  return { full, abbr };
}

function govCandidates({ full, abbr }: Transliteration, prefixes: readonly string[]): string[] {
  const urls = [
    `https://www.${full}.gov.cn`,
    `https://${full}.gov.cn`,
    `http://www.${full}.gov.cn`,
    `http://${full}.gov.cn`,
    `https://${abbr}.gov.cn`,
    `https://www.${abbr}.gov.cn`,
    `http://${abbr}.gov.cn`,
    `http://www.${abbr}.gov.cn`,
    `https://www.${abbr}s.gov.cn`,
    `https://${abbr}s.gov.cn`,
  ];
  for (const prefix of prefixes) {
    urls.push(`https://www.${prefix}${full}.gov.cn`, `https://www.${prefix}${abbr}.gov.cn`);
  }
  return urls;
}

function finCandidates({ full, abbr }: Transliteration, prefixes: readonly string[]): string[] {
  const urls: string[] = [];
  for (const token of FINANCE_SUBDOMAINS) {
    urls.push(
      `https://${token}.${full}.gov.cn`,
      `http://${token}.${full}.gov.cn`,
      `https://${token}.${abbr}.gov.cn`,
      `http://${token}.${abbr}.gov.cn`,
    );
  }
  for (const prefix of prefixes) {
    for (const token of FINANCE_SUBDOMAINS) {
      urls.push(`https://${token}.${prefix}${full}.gov.cn`, `https://${token}.${prefix}${abbr}.gov.cn`);
    }
  }
  return urls;
}

/**
 * Ordered root-URL candidates for a region; earlier entries are more likely. Pure: no I/O,
 * same input, same list.
 */
export function generateCandidates(
  region: Region,
  kind: SiteKind,
  prefixes: readonly string[] = provincePrefixes,
): Result<string[], ResolutionError> {
  const names = transliterate(region);
  if (!names) {
    return err(new ResolutionError("no_transliteration", `cannot transliterate region name "${region.name}"`));
  }

  const urls = kind === "gov" ? govCandidates(names, prefixes) : finCandidates(names, prefixes);
  return ok([...new Set(urls)]);
}
