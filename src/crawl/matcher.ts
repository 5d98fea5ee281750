import { Region } from "../types";

export const FINAL_ACCOUNTS_TERM = "决算";
export const SCOPE_TOKENS = ["本级", "本市"] as const;
export const EXCLUDED_TOKENS = ["部门", "单位", "街道", "镇", "乡"] as const;

export interface ReportFilter {
  term: string;
  year: string;
  scopeTokens: string[];
  excludedTokens: string[];
}

export function buildReportFilter(region: Region, targetYear: number): ReportFilter {
  return {
    term: FINAL_ACCOUNTS_TERM,
    year: String(targetYear),
    scopeTokens: [...SCOPE_TOKENS, ...region.variants],
    excludedTokens: [...EXCLUDED_TOKENS],
  };
}

/**
 * All four must hold: the final-accounts term, the target year, a city-level scope token
 * (or the region's name), and no subordinate-unit token.
 */
export function matchesReport(text: string, filter: ReportFilter): boolean {
  if (!text) {
    return false;
  }
  if (!text.includes(filter.term) || !text.includes(filter.year)) {
    return false;
  }
  if (!filter.scopeTokens.some((token) => text.includes(token))) {
    return false;
  }
  return !filter.excludedTokens.some((token) => text.includes(token));
}
