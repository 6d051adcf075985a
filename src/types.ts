export type SearchDepth = "basic" | "advanced";
export type ExtractDepth = "basic" | "advanced";
export type TimeRange = "day" | "week" | "month" | "year";

export type SearchRequest = {
  query: string;
  search_depth: SearchDepth;
  time_range?: TimeRange;
  max_results: number;
  include_domains: string[];
  exclude_domains: string[];
  include_raw_content: boolean;
};

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
  domain: string;
  file_format?: string;
  published_at?: string; // advanced only
  description?: string; // advanced only
  raw_content?: string; // top 3 only
};

export type ExtractionRequest = {
  urls: string[];
  extract_depth: ExtractDepth;
  include_images: boolean;
};

export type ExtractedImage = {
  url: string;
  alt?: string;
};

export type PageContent = {
  title?: string;
  description?: string;
  text: string;
  images?: ExtractedImage[];
};

export type PageError = {
  code: string;
  message: string;
  [detail: string]: string | number | string[] | undefined;
};

export type ExtractedPage =
  | ({ url: string; status: "success" } & PageContent)
  | { url: string; status: "failed"; error: PageError };
