import { Agent, fetch as undiciFetch } from "undici";

import {
  METBULL_BASE_URL,
  METBULL_TIMEOUT_MS,
  METBULL_USER_AGENT,
} from "../config.js";
import { catalogLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type FetchFailureKind = "Timeout" | "HTTPError" | "NetworkError";

export type PageFetchResult =
  | { ok: true; page: number; body: string }
  | {
      ok: false;
      page: number;
      kind: FetchFailureKind;
      message: string;
      status?: number;
    };

/**
 * Minimal response surface the client reads
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpGet = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResponse>;

export interface CatalogClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  /** Minimum gap between two requests */
  delayMs?: number;
  /** Value for the `pnt` render hint, omitted when undefined */
  renderHint?: string;
  httpGet?: HttpGet;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Request Building
// ============================================================================

/**
 * Build the search URL for one results page.
 *
 * The query is always "every name, newest year first" so pages can be walked
 * from the most recent record backwards.
 */
export function buildPageUrl(
  baseUrl: string,
  page: number,
  pageSize: number,
  renderHint?: string
): string {
  const url = new URL(baseUrl);
  url.searchParams.set("sea", "*");
  url.searchParams.set("sfor", "names");
  url.searchParams.set("srt", "year");
  url.searchParams.set("dir", "desc");
  url.searchParams.set("lrec", String(pageSize));
  url.searchParams.set("page", String(page));
  if (renderHint !== undefined) {
    url.searchParams.set("pnt", renderHint);
  }
  return url.toString();
}

function errorName(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "name" in error) {
    return typeof error.name === "string" ? error.name : undefined;
  }
  return undefined;
}

/**
 * Map a thrown fetch error to a failure kind
 */
export function classifyFetchError(error: unknown): FetchFailureKind {
  const name = errorName(error);
  return name === "TimeoutError" || name === "AbortError"
    ? "Timeout"
    : "NetworkError";
}

// ============================================================================
// Client
// ============================================================================

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class CatalogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly delayMs: number;
  private readonly renderHint?: string;
  private readonly httpGet: HttpGet;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestTime = 0;

  constructor(options: CatalogClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? METBULL_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? METBULL_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? METBULL_USER_AGENT;
    this.delayMs = options.delayMs ?? 1000;
    this.renderHint = options.renderHint;
    this.httpGet = options.httpGet ?? createInsecureHttpGet();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Fetch one results page. Failures come back as values, never as throws.
   */
  async fetchPage(page: number, pageSize: number): Promise<PageFetchResult> {
    await this.waitForSlot();

    const url = buildPageUrl(this.baseUrl, page, pageSize, this.renderHint);
    catalogLogger.debug({ url, page, pageSize }, "Requesting results page");

    const startTime = performance.now();
    try {
      const response = await this.httpGet(url, {
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        // Drain the body so the connection can be reused
        await response.text().catch((drainError: unknown) => {
          catalogLogger.debug(
            {
              page,
              error:
                drainError instanceof Error
                  ? drainError.message
                  : String(drainError),
            },
            "Could not read error response body"
          );
        });
        catalogLogger.warn(
          { page, status: response.status, statusText: response.statusText },
          "Results page returned an HTTP error"
        );
        return {
          ok: false,
          page,
          kind: "HTTPError",
          status: response.status,
          message: `HTTP ${String(response.status)} ${response.statusText}`,
        };
      }

      const body = await response.text();
      const duration = Math.round(performance.now() - startTime);
      catalogLogger.debug(
        {
          page,
          status: response.status,
          bytes: body.length,
          duration: `${String(duration)}ms`,
        },
        "Received results page"
      );

      return { ok: true, page, body };
    } catch (error) {
      const kind = classifyFetchError(error);
      const message = error instanceof Error ? error.message : String(error);
      catalogLogger.warn({ page, kind, error: message }, "Results page failed");
      return { ok: false, page, kind, message };
    }
  }

  private async waitForSlot(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (this.lastRequestTime > 0 && elapsed < this.delayMs) {
      const waitTime = this.delayMs - elapsed;
      catalogLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await this.sleep(waitTime);
    }

    this.lastRequestTime = Date.now();
  }
}

/**
 * The Bulletin host serves a certificate chain Node rejects, so certificate
 * checks are turned off for requests made through this dispatcher only.
 */
function createInsecureHttpGet(): HttpGet {
  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}
