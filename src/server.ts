import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { extract } from "./crawl";
import { AppError } from "./errors";
import { createLogger } from "./logger";
import { DEFAULT_MAX_RESULTS, MAX_RESULTS_LIMIT, MAX_URLS } from "./schemas";
import { search } from "./search";

export const SERVER_NAME = "web-research";
export const SERVER_VERSION = "0.1.0";

const log = createLogger("mcp");

function ok(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

async function run(tool: string, op: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return ok(await op());
  } catch (err) {
    if (!(err instanceof AppError)) throw err;
    log.warn(`${tool} failed: [${err.code}] ${err.message}`);
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify({ error: err.toJSON() }, null, 2) }],
    };
  }
}

// Bounds live in the operations' own schemas so that violations come back
// as structured VALIDATION_ERROR results.
const searchShape = {
  query: z.string().describe("The search query string."),
  search_depth: z
    .enum(["basic", "advanced"])
    .optional()
    .describe("basic (default) or advanced; advanced adds publication date and description metadata."),
  time_range: z
    .enum(["day", "week", "month", "year"])
    .optional()
    .describe("Only return results from the last day, week, month or year."),
  max_results: z
    .number()
    .optional()
    .describe(`Number of results to return (1-${MAX_RESULTS_LIMIT}, default ${DEFAULT_MAX_RESULTS}).`),
  include_domains: z.array(z.string()).optional().describe("Restrict results to these domains."),
  exclude_domains: z.array(z.string()).optional().describe("Never return results from these domains."),
  include_raw_content: z
    .boolean()
    .optional()
    .describe("Fetch the page text of the top 3 results."),
};

const extractShape = {
  urls: z.array(z.string()).describe(`URLs to fetch (1-${MAX_URLS}).`),
  extract_depth: z
    .enum(["basic", "advanced"])
    .optional()
    .describe("basic (default) returns flat text; advanced keeps headings, paragraphs and lists."),
  include_images: z.boolean().optional().describe("Also return up to 10 images per page."),
};

export function createServer(): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "search",
    {
      title: "Web search",
      description:
        "Search the web with Google. Returns a JSON list of results with title, url, snippet and domain.",
      inputSchema: searchShape,
    },
    async (args) => run("search", () => search(args)),
  );

  server.registerTool(
    "extract",
    {
      title: "Extract page content",
      description:
        "Fetch web pages and extract their main text (and optionally images). Each URL succeeds or fails on its own.",
      inputSchema: extractShape,
    },
    async (args) => run("extract", () => extract(args)),
  );

  return server;
}
