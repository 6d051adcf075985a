import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors";
dotenv.config();

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export type SearchCredentials = {
  apiKey: string;
  cx: string;
};

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

export const USER_AGENT = process.env.USER_AGENT ?? DEFAULT_USER_AGENT;
export const FETCH_TIMEOUT_MS = readNumber("FETCH_TIMEOUT_MS", 15000);
export const SEARCH_TIMEOUT_MS = readNumber("SEARCH_TIMEOUT_MS", 10000);
export const FETCH_MAX_ATTEMPTS = readNumber("FETCH_MAX_ATTEMPTS", 3);
export const FETCH_CONCURRENCY = readNumber("FETCH_CONCURRENCY", 5);
export const MAX_CONTENT_CHARS = readNumber("MAX_CONTENT_CHARS", 20000);
export const MAX_RESPONSE_BYTES = readNumber("MAX_RESPONSE_BYTES", 5 * 1024 * 1024);
export const EXTRACT_MAX_URLS = readNumber("EXTRACT_MAX_URLS", 20);
export const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";

/**
 * Reads the search API credentials. Called per request so that a server
 * started without them still serves `extract`.
 */
export function getSearchCredentials(env: NodeJS.ProcessEnv = process.env): SearchCredentials {
  const apiKey = env.GOOGLE_API_KEY?.trim();
  const cx = (env.GOOGLE_CSE_ID || env.GOOGLE_CX || env.Google_CX)?.trim(); // tolerate all three

  const missing: string[] = [];
  if (!apiKey) missing.push("GOOGLE_API_KEY");
  if (!cx) missing.push("GOOGLE_CSE_ID");
  if (!apiKey || !cx) throw new ConfigurationError(missing);

  return { apiKey, cx };
}
