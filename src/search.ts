import { extractPages } from "./crawl";
import { getSearchCredentials } from "./env";
import { googleSearch } from "./googleSearch";
import { createLogger } from "./logger";
import { parseSearchRequest } from "./schemas";
import type { SearchRequest, SearchResult } from "./types";
import { hostMatches, hostOf } from "./utils";

const log = createLogger("search");

export const RAW_CONTENT_LIMIT = 3;

function allowedBy(request: SearchRequest) {
  const { include_domains: include, exclude_domains: exclude } = request;
  return (result: SearchResult): boolean => {
    const host = hostOf(result.url);
    if (!host) return false;
    if (exclude.some((d) => hostMatches(host, d))) return false;
    return include.length === 0 || include.some((d) => hostMatches(host, d));
  };
}

async function attachRawContent(results: SearchResult[], request: SearchRequest): Promise<void> {
  const top = results.slice(0, RAW_CONTENT_LIMIT);
  const pages = await extractPages(
    top.map((r) => r.url),
    { depth: request.search_depth, includeImages: false },
  );

  pages.forEach((page, i) => {
    if (page.status === "success") top[i].raw_content = page.text;
    else log.warn(`raw content unavailable for ${page.url}: ${page.error.message}`);
  });
}

export async function search(input: unknown): Promise<SearchResult[]> {
  const request = parseSearchRequest(input);
  const credentials = getSearchCredentials();

  log.info(`"${request.query}" depth=${request.search_depth} max=${request.max_results}`);
  const found = await googleSearch(request, credentials);
  const results = found.filter(allowedBy(request)).slice(0, request.max_results);

  if (request.include_raw_content && results.length) {
    await attachRawContent(results, request);
  }

  log.info(`returning ${results.length} result(s)`);
  return results;
}
