import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config } from "../config";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
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

/**
 * GET a page and return its body. Any non-2xx status throws an HttpError;
 * there is no retry.
 */
export async function fetchPage(
  url: string,
  options: {
    headers?: Record<string, string>;
    timeoutMs?: number;
  } = {}
): Promise<string> {
  const { headers = {}, timeoutMs = config.httpTimeoutMs } = options;

  const fetchOptions: Parameters<typeof undiciFetch>[1] = {
    headers: {
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      ...headers,
    },
    dispatcher: getProxyDispatcher(),
  };
  if (timeoutMs !== undefined) {
    fetchOptions.signal = AbortSignal.timeout(timeoutMs);
  }

  const response = await undiciFetch(url, fetchOptions);
  if (!response.ok) {
    throw new HttpError(response.status, url);
  }
  return response.text();
}

/** Cell text with runs of whitespace collapsed and the ends trimmed. */
export function normalizeText(raw: string): string {
  return raw.replace(/\s+/g, " ").trim();
}

export function absoluteUrl(baseUrl: string, href: string): string {
  return href.startsWith("http") ? href : `${baseUrl}${href}`;
}
