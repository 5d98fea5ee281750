/** scheme://host of a URL, or undefined when it does not parse as http(s). */
export function normalizeRoot(url: string): string | undefined {
  const parsed = tryParseUrl(url.includes("://") ? url : `https://${url}`);
  if (!parsed || (parsed.protocol !== "http:" && parsed.protocol !== "https:") || !parsed.host) {
    return undefined;
  }
  return `${parsed.protocol}//${parsed.host}`;
}

export function tryParseUrl(value: string, base?: string): URL | undefined {
  try {
    return new URL(value, base);
  } catch {
    return undefined;
  }
}

/**
 * Absolute form of an href, with the fragment dropped. Non-navigational hrefs
 * (`javascript:`, `mailto:`, `tel:`, fragment-only) and unparsable ones give undefined.
 */
export function resolveHref(href: string, baseUrl: string): string | undefined {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return undefined;
  }
  const lowered = trimmed.toLowerCase();
  if (lowered.startsWith("javascript:") || lowered.startsWith("mailto:") || lowered.startsWith("tel:")) {
    return undefined;
  }

  const parsed = tryParseUrl(trimmed, baseUrl);
  if (!parsed || (parsed.protocol !== "http:" && parsed.protocol !== "https:")) {
    return undefined;
  }
  parsed.hash = "";
  return parsed.toString();
}

export function hostOf(url: string): string | undefined {
  return tryParseUrl(url)?.hostname.toLowerCase();
}

export function isSameHost(url: string, other: string): boolean {
  const a = hostOf(url);
  return a !== undefined && a === hostOf(other);
}

/** The matching extension (lowercase, with dot) when the URL path ends in one of `extensions`. */
export function fileExtensionOf(url: string, extensions: readonly string[]): string | undefined {
  const parsed = tryParseUrl(url);
  const pathname = (parsed ? parsed.pathname : url.split(/[?#]/)[0]).toLowerCase();
  return extensions.find((extension) => pathname.endsWith(extension.toLowerCase()));
}

export function lastPathSegment(url: string): string {
  const parsed = tryParseUrl(url);
  const pathname = parsed ? parsed.pathname : url;
  const segment = pathname.split("/").filter((part) => part.length > 0).pop() ?? "";
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
