import { WorkerContext, isAborted } from "../core/context";
import { ResolutionError } from "../core/errors";
import { err, ok, Result } from "../core/result";
import { hasAnyRoot, MappingStore } from "../store";
import { Region, SiteKind, SiteMapping } from "../types";
import { generateCandidates } from "./candidates";
import { SearchResultCache, searchForRoot } from "./searchFallback";
import { findFirstLive } from "./verifier";

export interface ResolverDeps {
  store: MappingStore;
  searchCache?: SearchResultCache;
}

export interface SiteResolution {
  mapping: SiteMapping;
  fromStore: boolean;
  /** Non-fatal notes gathered on the way, such as a name that could not be transliterated. */
  diagnostics: string[];
}

const KINDS: SiteKind[] = ["gov", "fin"];

async function resolveKind(
  ctx: WorkerContext,
  region: Region,
  kind: SiteKind,
  deps: ResolverDeps,
  diagnostics: string[],
): Promise<string | undefined> {
  const candidates = generateCandidates(region, kind);
  if (candidates.ok) {
    const live = await findFirstLive(ctx, candidates.value, {
      requireTitleKeyword: kind === "fin" && ctx.config.requireFinanceTitle ? ctx.config.financeTitleKeyword : undefined,
    });
    if (live) {
      ctx.logger.info("candidate_resolved", { region: region.name, kind, root: live });
      return live;
    }
  } else {
    diagnostics.push(`${kind}: ${candidates.error.message}`);
    ctx.logger.warn("transliteration_failed", { region: region.name, kind });
  }

  if (isAborted(ctx)) {
    return undefined;
  }
  const searched = await searchForRoot(ctx, region, kind, deps.searchCache);
  if (searched.ok) {
    return searched.value.root;
  }
  diagnostics.push(`${kind}: ${searched.error.message}`);
  return undefined;
}

/**
 * Site roots for a region. A stored entry is authoritative: one with any root is used as
 * is, and one with no roots means an earlier run already failed, so it is only retried
 * when `retryUnresolved` is on. Fresh results, empty or not, are written back unless the
 * run was interrupted.
 */
export async function resolveSiteMapping(
  ctx: WorkerContext,
  region: Region,
  deps: ResolverDeps,
): Promise<Result<SiteResolution, ResolutionError>> {
  const stored = await deps.store.get(region.name);
  if (stored && hasAnyRoot(stored)) {
    ctx.logger.debug("mapping_cache_hit", { region: region.name, gov: stored.gov, fin: stored.fin });
    return ok({ mapping: stored, fromStore: true, diagnostics: [] });
  }
  if (stored && !ctx.config.retryUnresolved) {
    return err(new ResolutionError("previously_unresolved", "no website found in an earlier run"));
  }

  const diagnostics: string[] = [];
  const found: SiteMapping = {};
  for (const kind of KINDS) {
    if (isAborted(ctx)) {
      break;
    }
    const root = await resolveKind(ctx, region, kind, deps, diagnostics);
    if (root) {
      found[kind] = root;
    }
  }

  if (isAborted(ctx)) {
    if (!hasAnyRoot(found)) {
      return err(new ResolutionError("not_found", "interrupted before a website was found", diagnostics));
    }
    ctx.logger.info("mapping_not_stored_interrupted", { region: region.name });
    return ok({ mapping: found, fromStore: false, diagnostics });
  }

  const mapping = await deps.store.put(region.name, found);
  if (!hasAnyRoot(mapping)) {
    return err(new ResolutionError("not_found", "no government or finance website found", diagnostics));
  }
  return ok({ mapping, fromStore: false, diagnostics });
}
