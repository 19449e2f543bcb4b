import { request } from "undici";
import {
  PageParseError,
  errorCode,
  isAbortError,
  isLocalResourceError,
  stringifyError,
} from "../common/errors.js";
import { parseMatchPage } from "../extract/matchPage.js";
import type { Logger } from "../logger.js";
import type { FetchFailure, FetchResult, MatchRecord, PageFetcher, PageModel } from "../types.js";

export interface HttpResult {
  body: string;
  status: number;
}

export type HttpGet = (url: string, signal?: AbortSignal) => Promise<HttpResult>;

export interface HttpPageFetcherOptions {
  timeoutMs: number;
  logger: Logger;
  /** Pre-rendering endpoint, `{url}` is replaced by the encoded match URL. */
  pageUrlTemplate?: string;
  userAgent?: string;
  httpGet?: HttpGet;
  parse?: (html: string) => PageModel;
}

const PERMANENT_STATUSES = new Set([404, 410]);

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/120.0.0.0 Safari/537.36";

export class HttpPageFetcher implements PageFetcher {
  readonly name = "http";
  private readonly options: HttpPageFetcherOptions;
  private readonly httpGet: HttpGet;
  private readonly parse: (html: string) => PageModel;

  constructor(options: HttpPageFetcherOptions) {
    this.options = options;
    this.httpGet =
      options.httpGet ??
      createUndiciGet(options.timeoutMs, options.userAgent ?? DEFAULT_USER_AGENT);
    this.parse = options.parse ?? parseMatchPage;
  }

  async fetch(match: MatchRecord, signal?: AbortSignal): Promise<FetchResult> {
    const url = resolvePageUrl(match.url, this.options.pageUrlTemplate);
    let response: HttpResult;
    try {
      response = await this.httpGet(url, signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      return { kind: "failure", failure: classifyTransportError(error) };
    }

    if (PERMANENT_STATUSES.has(response.status)) {
      return {
        kind: "failure",
        failure: {
          retryable: false,
          permanent: true,
          message: `HTTP ${response.status} for ${url}`,
          code: "HTTP_STATUS",
        },
      };
    }
    if (response.status >= 400) {
      return {
        kind: "failure",
        failure: { retryable: true, message: `HTTP ${response.status} for ${url}`, code: "HTTP_STATUS" },
      };
    }

    try {
      const page = this.parse(response.body);
      this.options.logger.debug(
        `${match.matchUid}: page ${page.home.name ?? "?"} vs ${page.away.name ?? "?"} ` +
          `(ids ${page.home.id ?? "-"}/${page.away.id ?? "-"})`,
      );
      return { kind: "page", page };
    } catch (error) {
      if (error instanceof PageParseError) {
        return {
          kind: "failure",
          failure: { retryable: true, message: error.message, code: "PARSE_MISS" },
        };
      }
      throw error;
    }
  }
}

export function resolvePageUrl(matchUrl: string, template?: string): string {
  if (!template) {
    return matchUrl;
  }
  return template.replace("{url}", encodeURIComponent(matchUrl));
}

/** Local resource exhaustion halts the shard; anything on the wire is retried. */
export function classifyTransportError(error: unknown): FetchFailure {
  const code = errorCode(error);
  return {
    retryable: !isLocalResourceError(error),
    message: stringifyError(error) || code || "request failed",
    code,
  };
}

function createUndiciGet(timeoutMs: number, userAgent: string): HttpGet {
  return async (url, signal) => {
    const { statusCode, body } = await request(url, {
      method: "GET",
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.5",
      },
      maxRedirections: 3,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal,
    });
    const text = await body.text();
    return { body: text, status: statusCode };
  };
}
