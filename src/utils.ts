import { ValidationError } from "./errors";

export function trimTo(s: string | undefined, n = 300): string | undefined {
  if (!s) return s;
  const t = s.replace(/\s+/g, " ").trim();
  return t.length > n ? t.slice(0, n - 1) + "…" : t;
}

/** Like {@link trimTo} but keeps line breaks. */
export function truncate(s: string, n: number): string {
  return s.length > n ? s.slice(0, n - 1).trimEnd() + "…" : s;
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export function parseHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${raw}`, "urls");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`, "urls");
  }
  return url;
}

/**
 * "https://WWW.Bücher.de.:8080/path" → "xn--bcher-kva.de", the form URL
 * hosts take. Returns "" when nothing host-like is left.
 */
export function normalizeDomain(raw: string): string {
  const stripped = raw
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, "")
    .replace(/[/?#].*$/, "");
  if (!stripped) return "";

  let host: string;
  try {
    host = new URL(`http://${stripped}`).hostname;
  } catch {
    return "";
  }
  return host.replace(/\.$/, "").replace(/^www\./, "");
}

export function hostOf(url: string): string | undefined {
  try {
    return new URL(url).hostname.toLowerCase().replace(/\.$/, "");
  } catch {
    return undefined;
  }
}

export function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}
