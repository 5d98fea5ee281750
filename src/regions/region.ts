import { Region } from "../types";

const ADMINISTRATIVE_SUFFIXES = ["自治州", "自治区", "地区", "市", "盟"] as const;

export function stripAdministrativeSuffix(name: string): string {
  const trimmed = name.trim();
  for (const suffix of ADMINISTRATIVE_SUFFIXES) {
    if (trimmed.endsWith(suffix) && trimmed.length > suffix.length) {
      return trimmed.slice(0, -suffix.length);
    }
  }
  return trimmed;
}

export function createRegion(name: string): Region {
  const canonical = name.trim();
  const baseName = stripAdministrativeSuffix(canonical);
  const variants = [canonical];
  if (baseName !== canonical) {
    variants.push(baseName);
  }
  if (!canonical.endsWith("市")) {
    variants.push(`${baseName}市`);
  }
  return { name: canonical, baseName, variants: [...new Set(variants)] };
}
