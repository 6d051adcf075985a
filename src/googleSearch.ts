import { google, type customsearch_v1 } from "googleapis";
import { SEARCH_TIMEOUT_MS, type SearchCredentials } from "./env";
import { UpstreamError } from "./errors";
import { createLogger } from "./logger";
import { MAX_RESULTS_LIMIT } from "./schemas";
import type { SearchRequest, SearchResult, TimeRange } from "./types";
import { hostOf } from "./utils";

const log = createLogger("google");

export const SERVICE = "Google Custom Search";

export const DATE_RESTRICT: Record<TimeRange, string> = {
  day: "d1",
  week: "w1",
  month: "m1",
  year: "y1",
};

// basic depth only asks for what toResult reads without pagemap
export const BASIC_FIELDS = "items(title,link,snippet,displayLink,fileFormat)";

const PUBLISHED_TAGS = ["article:published_time", "og:updated_time", "date"];

/** Appends `site:` restrictions; a domain in both lists counts as excluded. */
export function buildQuery(query: string, include: string[], exclude: string[]): string {
  const allowed = include.filter((d) => !exclude.includes(d));
  const parts = [query];

  if (allowed.length === 1) parts.push(`site:${allowed[0]}`);
  else if (allowed.length > 1) parts.push(`(${allowed.map((d) => `site:${d}`).join(" OR ")})`);

  parts.push(...exclude.map((d) => `-site:${d}`));
  return parts.join(" ");
}

export function buildSearchParams(
  request: SearchRequest,
  credentials: SearchCredentials,
): customsearch_v1.Params$Resource$Cse$List {
  return {
    q: buildQuery(request.query, request.include_domains, request.exclude_domains),
    cx: credentials.cx,
    key: credentials.apiKey,
    num: Math.min(Math.max(Math.floor(request.max_results), 1), MAX_RESULTS_LIMIT),
    ...(request.time_range ? { dateRestrict: DATE_RESTRICT[request.time_range] } : {}),
    ...(request.search_depth === "basic" ? { fields: BASIC_FIELDS } : {}),
  };
}

function readMetatag(item: customsearch_v1.Schema$Result, names: string[]): string | undefined {
  const metatags = item.pagemap?.metatags;
  if (!Array.isArray(metatags)) return undefined;
  for (const tags of metatags) {
    if (typeof tags !== "object" || tags === null) continue;
    for (const name of names) {
      const value: unknown = tags[name];
      if (typeof value === "string" && value.trim()) return value.trim();
    }
  }
  return undefined;
}

export function toResult(item: customsearch_v1.Schema$Result, advanced: boolean): SearchResult {
  const url = item.link ?? "";
  const result: SearchResult = {
    title: item.title ?? "No title",
    url,
    snippet: item.snippet?.replace(/\s+/g, " ").trim() ?? "",
    domain: item.displayLink ?? hostOf(url) ?? "unknown",
  };
  if (item.fileFormat) result.file_format = item.fileFormat;

  if (advanced) {
    const published = readMetatag(item, PUBLISHED_TAGS);
    const description = readMetatag(item, ["og:description"]);
    if (published) result.published_at = published;
    if (description) result.description = description;
  }
  return result;
}

function describeFailure(err: unknown): { message: string; status?: number } {
  const message = err instanceof Error ? err.message : String(err);
  if (typeof err !== "object" || err === null || !("response" in err)) return { message };

  const { response } = err;
  if (typeof response !== "object" || response === null) return { message };

  const status = "status" in response && typeof response.status === "number" ? response.status : undefined;
  let detail: string | undefined;
  if ("data" in response && typeof response.data === "object" && response.data !== null && "error" in response.data) {
    const apiError = response.data.error;
    if (typeof apiError === "object" && apiError !== null && "message" in apiError && typeof apiError.message === "string") {
      detail = apiError.message;
    }
  }

  const prefix = status ? `HTTP ${status}` : "Request failed";
  return { message: `${prefix} - ${detail ?? message}`, status };
}

export async function googleSearch(request: SearchRequest, credentials: SearchCredentials): Promise<SearchResult[]> {
  const customsearch = google.customsearch("v1");
  const params = buildSearchParams(request, credentials);
  log.debug(`q=${JSON.stringify(params.q)} num=${params.num} dateRestrict=${params.dateRestrict ?? "-"}`);

  let data: customsearch_v1.Schema$Search;
  try {
    const res = await customsearch.cse.list(params, { timeout: SEARCH_TIMEOUT_MS });
    data = res.data;
  } catch (err) {
    const { message, status } = describeFailure(err);
    log.error(`${SERVICE} error: ${message}`);
    throw new UpstreamError(SERVICE, message, status);
  }

  const items = data.items ?? [];
  if (!items.length) {
    log.info(`No results found for query: "${request.query}"`);
    return [];
  }

  return items
    .filter((i) => Boolean(i.link))
    .map((i) => toResult(i, request.search_depth === "advanced"));
}
