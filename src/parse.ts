import { load, type CheerioAPI } from "cheerio";
import { MAX_CONTENT_CHARS } from "./env";
import type { ExtractDepth, ExtractedImage, PageContent } from "./types";
import { trimTo, truncate } from "./utils";

export const MAX_IMAGES = 10;

const BOILERPLATE = [
  "script",
  "style",
  "noscript",
  "template",
  "iframe",
  "svg",
  "nav",
  "header",
  "footer",
  "aside",
  "form",
  "[role='navigation']",
  "[aria-hidden='true']",
].join(", ");

const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, blockquote, pre";

export type ParseOptions = {
  depth: ExtractDepth;
  includeImages: boolean;
  maxChars?: number;
};

export function parseContent(html: string, url: string, options: ParseOptions): PageContent {
  const $ = load(html);
  const base = resolveBase($, url);

  const title =
    $("meta[property='og:title']").attr("content")?.trim() ||
    $("title").first().text().trim() ||
    $("h1").first().text().trim() ||
    undefined;

  const description =
    $("meta[name='description']").attr("content") ||
    $("meta[property='og:description']").attr("content") ||
    undefined;

  $(BOILERPLATE).remove();

  const images = options.includeImages ? collectImages($, base) : undefined;

  const text = options.depth === "advanced" ? structuredText($) : flatText($);

  return {
    title: trimTo(title, 300),
    description: trimTo(description, 300),
    text: truncate(text, options.maxChars ?? MAX_CONTENT_CHARS),
    ...(images ? { images } : {}),
  };
}

function mainRegion($: CheerioAPI) {
  for (const selector of ["article", "main", "[role='main']"]) {
    const region = $(selector).first();
    if (region.length && region.text().trim()) return region;
  }
  return $("body");
}

function flatText($: CheerioAPI): string {
  return mainRegion($).text().replace(/\s+/g, " ").trim();
}

function structuredText($: CheerioAPI): string {
  const region = mainRegion($);
  const blocks: string[] = [];

  region.find(BLOCKS).each((_, el) => {
    const node = $(el);
    // nested blocks are covered by their outermost block
    if (node.parents("p, li, blockquote, pre").length) return;

    const tag = el.tagName.toLowerCase();
    const text =
      tag === "pre" ? node.text().replace(/^\n+|\s+$/g, "") : node.text().replace(/\s+/g, " ").trim();
    if (!text) return;

    if (/^h[1-6]$/.test(tag)) blocks.push(`${"#".repeat(Number(tag[1]))} ${text}`);
    else if (tag === "li") blocks.push(`- ${text}`);
    else if (tag === "blockquote") blocks.push(`> ${text}`);
    else blocks.push(text);
  });

  // pages built from bare <div>s have no blocks to walk
  return blocks.length ? blocks.join("\n\n") : region.text().replace(/\s+/g, " ").trim();
}

function resolveBase($: CheerioAPI, url: string): string {
  const href = $("base[href]").attr("href");
  if (!href) return url;
  try {
    return new URL(href, url).href;
  } catch {
    return url;
  }
}

function collectImages($: CheerioAPI, base: string): ExtractedImage[] {
  const images: ExtractedImage[] = [];
  const seen = new Set<string>();

  $("img").each((_, el) => {
    if (images.length >= MAX_IMAGES) return false;
    const node = $(el);
    const src = (node.attr("src") || node.attr("data-src"))?.trim();
    if (!src || src.startsWith("data:")) return;

    let absolute: string;
    try {
      absolute = new URL(src, base).href;
    } catch {
      return;
    }
    if (seen.has(absolute)) return;
    seen.add(absolute);

    const alt = node.attr("alt")?.trim();
    images.push(alt ? { url: absolute, alt } : { url: absolute });
  });

  return images;
}
