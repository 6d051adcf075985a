import type { Readable } from "node:stream";
import axios from "axios";
import { decodeBuffer } from "encoding-sniffer";
import { FETCH_MAX_ATTEMPTS, FETCH_TIMEOUT_MS, MAX_RESPONSE_BYTES, USER_AGENT } from "./env";
import { FetchError } from "./errors";
import { createLogger } from "./logger";
import { sleep } from "./utils";

const log = createLogger("http");

const HTML_TYPES = ["text/html", "application/xhtml+xml", "text/plain"];
const TIMEOUT_CODES = ["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"];

export const http = axios.create({
  headers: {
    "User-Agent": USER_AGENT,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8"
  },
  timeout: FETCH_TIMEOUT_MS,
  maxRedirects: 5,
});

export type FetchOptions = {
  timeoutMs?: number;
  maxBytes?: number;
};

const timedOut = (url: string, ms: number) => new FetchError(url, `Request timed out after ${ms}ms`);

function isTimeout(err: unknown): boolean {
  return axios.isAxiosError(err) && TIMEOUT_CODES.includes(err.code ?? "");
}

function toFetchError(url: string, err: unknown, timeoutMs: number): FetchError {
  if (err instanceof FetchError) return err;
  if (isTimeout(err)) return timedOut(url, timeoutMs);
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status) return new FetchError(url, `HTTP ${status}`, status);
    return new FetchError(url, err.message);
  }
  return new FetchError(url, err instanceof Error ? err.message : String(err));
}

function charsetOf(contentType: string): string | undefined {
  return /charset=["']?([^;"'\s]+)/i.exec(contentType)?.[1];
}

// Reads at most maxBytes; the signal also covers the body, not just the headers.
async function readBody(stream: Readable, url: string, maxBytes: number, signal: AbortSignal, timeoutMs: number) {
  const onAbort = () => stream.destroy(timedOut(url, timeoutMs));
  if (signal.aborted) onAbort();
  signal.addEventListener("abort", onAbort, { once: true });

  const chunks: Buffer[] = [];
  let size = 0;
  try {
    for await (const chunk of stream) {
      const piece: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += piece.length;
      if (size > maxBytes) {
        stream.destroy();
        throw new FetchError(url, `Response exceeds ${maxBytes} bytes`);
      }
      chunks.push(piece);
    }
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
  return Buffer.concat(chunks);
}

function release(err: unknown) {
  if (!axios.isAxiosError(err)) return;
  const body: unknown = err.response?.data;
  if (typeof body === "object" && body !== null && "destroy" in body && typeof body.destroy === "function") {
    body.destroy();
  }
}

/**
 * GETs a page and decodes it by its declared or sniffed charset. The whole
 * request, body included, is bounded by the timeout. Network errors and 5xx
 * are retried with exponential backoff up to FETCH_MAX_ATTEMPTS; timeouts
 * and everything else fail at once.
 */
export async function getHtml(url: string, options: FetchOptions = {}, attempt = 1): Promise<string> {
  const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
  const maxBytes = options.maxBytes ?? MAX_RESPONSE_BYTES;
  const signal = AbortSignal.timeout(timeoutMs);

  try {
    const res = await http.get<Readable>(url, { responseType: "stream", timeout: timeoutMs, signal });
    const contentType = String(res.headers["content-type"] ?? "").toLowerCase();
    if (contentType && !HTML_TYPES.some((t) => contentType.includes(t))) {
      res.data.destroy();
      throw new FetchError(url, `Unsupported content type: ${contentType}`, res.status);
    }
    const declared = Number(res.headers["content-length"]);
    if (declared > maxBytes) {
      res.data.destroy();
      throw new FetchError(url, `Response exceeds ${maxBytes} bytes`, res.status);
    }

    const body = await readBody(res.data, url, maxBytes, signal, timeoutMs);
    return decodeBuffer(body, { transportLayerEncodingLabel: charsetOf(contentType), defaultEncoding: "utf-8" });
  } catch (err) {
    release(err);
    const status = axios.isAxiosError(err) ? err.response?.status : undefined;
    if (axios.isAxiosError(err) && !isTimeout(err) && attempt < FETCH_MAX_ATTEMPTS && (!status || status >= 500)) {
      const delay = 500 * 2 ** (attempt - 1);
      log.debug(`retrying ${url} in ${delay}ms (attempt ${attempt + 1}/${FETCH_MAX_ATTEMPTS})`);
      await sleep(delay);
      return getHtml(url, options, attempt + 1);
    }
    throw toFetchError(url, err, timeoutMs);
  }
}
