import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { getHtml } from "./http";
import { createServer } from "./server";

const listMock = vi.hoisted(() => vi.fn());

vi.mock("googleapis", () => ({
  google: { customsearch: () => ({ cse: { list: listMock } }) },
}));
vi.mock("./http", () => ({ getHtml: vi.fn() }));

const getHtmlMock = vi.mocked(getHtml);

let client: Client;

beforeEach(async () => {
  listMock.mockReset();
  getHtmlMock.mockReset();
  vi.stubEnv("GOOGLE_API_KEY", "test-key");
  vi.stubEnv("GOOGLE_CSE_ID", "test-cx");
  vi.stubEnv("GOOGLE_CX", "");
  vi.stubEnv("Google_CX", "");

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createServer().connect(serverTransport);
  client = new Client({ name: "test-client", version: "0.0.0" });
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  vi.unstubAllEnvs();
});

async function call(name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== "text") throw new Error("expected text content");
  return { isError: result.isError ?? false, body: JSON.parse(first.text) as unknown };
}

describe("MCP server", () => {
  it("lists the search and extract tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["extract", "search"]);
  });

  it("returns search results as JSON", async () => {
    listMock.mockResolvedValue({
      data: { items: [{ title: "Solar", link: "https://energy.gov/solar", snippet: "About solar", displayLink: "energy.gov" }] },
    });

    const { isError, body } = await call("search", { query: "solar", max_results: 3 });

    expect(isError).toBe(false);
    expect(body).toEqual([{ title: "Solar", url: "https://energy.gov/solar", snippet: "About solar", domain: "energy.gov" }]);
  });

  it("reports validation failures as structured tool errors", async () => {
    const { isError, body } = await call("search", { query: "" });

    expect(isError).toBe(true);
    expect(body).toEqual({ error: { code: "VALIDATION_ERROR", message: "query: must not be empty", field: "query" } });
    expect(listMock).not.toHaveBeenCalled();
  });

  it("reports out-of-range max_results", async () => {
    const { isError, body } = await call("search", { query: "solar", max_results: 50 });

    expect(isError).toBe(true);
    expect(body).toEqual({
      error: { code: "VALIDATION_ERROR", message: "max_results: must be between 1 and 10", field: "max_results" },
    });
  });

  it("reports missing credentials", async () => {
    vi.stubEnv("GOOGLE_CSE_ID", "");

    const { isError, body } = await call("search", { query: "solar" });

    expect(isError).toBe(true);
    expect(body).toEqual({
      error: { code: "CONFIGURATION_ERROR", message: "Missing configuration: GOOGLE_CSE_ID", missing: ["GOOGLE_CSE_ID"] },
    });
  });

  it("returns per-URL results from extract without failing the call", async () => {
    getHtmlMock.mockResolvedValue("<html><body><main><p>Hello from A</p></main></body></html>");

    const { isError, body } = await call("extract", { urls: ["https://example.com/a", "not-a-valid-url"] });

    expect(isError).toBe(false);
    expect(body).toEqual([
      { url: "https://example.com/a", status: "success", text: "Hello from A" },
      {
        url: "not-a-valid-url",
        status: "failed",
        error: { code: "VALIDATION_ERROR", message: "Invalid URL: not-a-valid-url", field: "urls" },
      },
    ]);
  });

  it("reports an empty URL list as a tool error", async () => {
    const { isError, body } = await call("extract", { urls: [] });

    expect(isError).toBe(true);
    expect(body).toEqual({
      error: { code: "VALIDATION_ERROR", message: "urls: must contain at least one URL", field: "urls" },
    });
  });
});
