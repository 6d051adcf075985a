import pLimit from "p-limit";
import { FETCH_CONCURRENCY } from "./env";
import { AppError, FetchError } from "./errors";
import { getHtml } from "./http";
import { createLogger } from "./logger";
import { parseContent, type ParseOptions } from "./parse";
import { parseExtractionRequest } from "./schemas";
import type { ExtractedPage } from "./types";
import { parseHttpUrl } from "./utils";

const log = createLogger("extract");

export async function extractPage(url: string, options: ParseOptions): Promise<ExtractedPage> {
  try {
    const target = parseHttpUrl(url);
    const html = await getHtml(target.href);
    const content = parseContent(html, target.href, options);
    if (!content.text) throw new FetchError(url, "No readable content");
    return { url, status: "success", ...content };
  } catch (err) {
    const failure = err instanceof AppError ? err : new FetchError(url, err instanceof Error ? err.message : String(err));
    log.warn(`${url} failed: ${failure.message}`);
    return { url, status: "failed", error: failure.toJSON() };
  }
}

/** Results come back in the order of `urls`, one per entry. */
export async function extractPages(urls: string[], options: ParseOptions, concurrency = FETCH_CONCURRENCY) {
  const limit = pLimit(concurrency);
  const tasks = urls.map((u) =>
    limit(async () => extractPage(u, options))
  );
  return Promise.all(tasks);
}

export async function extract(input: unknown): Promise<ExtractedPage[]> {
  const request = parseExtractionRequest(input);
  log.info(`extracting ${request.urls.length} URL(s) at ${request.extract_depth} depth`);

  const pages = await extractPages(request.urls, {
    depth: request.extract_depth,
    includeImages: request.include_images,
  });

  const ok = pages.filter((p) => p.status === "success").length;
  log.info(`extracted ${ok}/${pages.length} page(s)`);
  return pages;
}
