import { z } from "zod";
import { EXTRACT_MAX_URLS } from "./env";
import { ValidationError } from "./errors";
import type { ExtractionRequest, SearchRequest } from "./types";
import { normalizeDomain } from "./utils";

export const MAX_RESULTS_LIMIT = 10; // Google caps at 10
export const DEFAULT_MAX_RESULTS = 5;
export const MAX_URLS = EXTRACT_MAX_URLS;

const DomainListSchema = z
  .array(z.string())
  .default([])
  .transform((domains) => Array.from(new Set(domains.map(normalizeDomain).filter(Boolean))));

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, "must not be empty"),
  search_depth: z.enum(["basic", "advanced"]).default("basic"),
  time_range: z.enum(["day", "week", "month", "year"]).optional(),
  max_results: z
    .number()
    .int("must be an integer")
    .min(1, `must be between 1 and ${MAX_RESULTS_LIMIT}`)
    .max(MAX_RESULTS_LIMIT, `must be between 1 and ${MAX_RESULTS_LIMIT}`)
    .default(DEFAULT_MAX_RESULTS),
  include_domains: DomainListSchema,
  exclude_domains: DomainListSchema,
  include_raw_content: z.boolean().default(false),
});

export const ExtractionRequestSchema = z.object({
  urls: z
    .array(z.string())
    .min(1, "must contain at least one URL")
    .max(MAX_URLS, `must contain at most ${MAX_URLS} URLs`),
  extract_depth: z.enum(["basic", "advanced"]).default("basic"),
  include_images: z.boolean().default(false),
});

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue?.path.join(".") || undefined;
  const message = issue ? issue.message : "Invalid input";
  return new ValidationError(field ? `${field}: ${message}` : message, field);
}

export function parseSearchRequest(input: unknown): SearchRequest {
  const parsed = SearchRequestSchema.safeParse(input);
  if (!parsed.success) throw toValidationError(parsed.error);
  return parsed.data;
}

export function parseExtractionRequest(input: unknown): ExtractionRequest {
  const parsed = ExtractionRequestSchema.safeParse(input);
  if (!parsed.success) throw toValidationError(parsed.error);
  return parsed.data;
}
