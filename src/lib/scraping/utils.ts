import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { getHttpCache, setHttpCache } from "./http-cache";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  /** 0 bypasses the cache, undefined uses the cache default */
  cacheTtlMs?: number;
  /** Wait before each network request; cache hits are never delayed */
  politeDelayMs?: number;
}

export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const {
    retries = 3,
    retryDelayMs = 2000,
    timeoutMs = 15000,
    cacheTtlMs,
    politeDelayMs = config.scrapeDelayMs,
  } = options;

  const cached = getHttpCache(url, cacheTtlMs);
  if (cached) return cached;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await undiciFetch(url, {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      });

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          await delay(retryDelayMs * Math.pow(2, attempt));
          continue;
        }
        throw new Error(`Rate limited (${response.status}) after ${retries} retries: ${url}`);
      }

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} for ${url}`);
      }

      const body = await response.text();
      setHttpCache(url, body, { ttlMs: cacheTtlMs });
      return body;
    } catch (error: unknown) {
      if (attempt < retries && error instanceof Error && error.name === "AbortError") {
        await delay(retryDelayMs * Math.pow(2, attempt));
        continue;
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  throw new Error(`Failed to fetch ${url} after ${retries} retries`);
}

/** Join a site-relative link ("/breaks/pipeline") onto the configured base URL. */
export function resolveUrl(link: string, baseUrl: string): string {
  return new URL(link, baseUrl).toString();
}
