import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { action, defineCapability } from "./defineCapability.js";
import { fetchWithTimeout } from "./http.js";

export interface SearchCapabilityOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export const SEARCH_FAILED = "Failed to retrieve search results";
export const GET_FAILED = "Failed to retrieve content";

/**
 * Web search and page retrieval. Non-2xx answers yield a fixed failure string
 * instead of an error so the model can read them back.
 */
export function createSearchCapability(options: SearchCapabilityOptions = {}): Capability {
  const baseUrl = (options.baseUrl ?? "https://www.google.com").replace(/\/$/, "");
  const timeoutMs = options.timeoutMs;

  return defineCapability("SearchAdapter", {
    search: action({
      description: "Search the web and return the raw result page",
      parameters: z.object({ search_term: z.string().min(1) }).strict(),
      run: async ({ search_term }) => {
        const url = `${baseUrl}/search?q=${encodeURIComponent(search_term)}`;
        const response = await fetchWithTimeout(url, { method: "GET" }, timeoutMs);
        return response.ok ? response.text() : SEARCH_FAILED;
      },
    }),
    get: action({
      description: "Fetch a URL and return its body as text",
      parameters: z.object({ url: z.string().url() }).strict(),
      run: async ({ url }) => {
        const response = await fetchWithTimeout(url, { method: "GET" }, timeoutMs);
        return response.ok ? response.text() : GET_FAILED;
      },
    }),
  });
}
