/**
 * Token Metadata Module
 * Fetches the JSON document behind a token URI and extracts its links
 */

import { config } from "../config.js";
import { NOT_AVAILABLE } from "../constants.js";
import { createChildLogger } from "../logger.js";
import type { TokenMetadata } from "../parser/types.js";

const logger = createChildLogger("metadata");

// Hosts a token author must not make us reach
const BLOCKED_HOSTS = new Set([
  "localhost",
  "0.0.0.0",
  "[::]",
  "[::1]",
  "metadata.google.internal",
]);

const PRIVATE_IPV4_RANGES = [
  /^10\./,                         // 10.0.0.0/8
  /^172\.(1[6-9]|2[0-9]|3[01])\./, // 172.16.0.0/12
  /^192\.168\./,                   // 192.168.0.0/16
  /^169\.254\./,                   // Link-local, cloud metadata
  /^127\./,                        // Loopback
  /^0\./,                          // Current network
];

const PRIVATE_IPV6_RANGES = [
  /^\[f[cd][0-9a-f]{2}:/i,         // Unique local (fc00::/7)
  /^\[fe80:/i,                     // Link-local
  /^\[::ffff:/i,                   // IPv4-mapped
];

function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  if (BLOCKED_HOSTS.has(lower)) return true;
  if (/^\d{1,3}(\.\d{1,3}){3}$/.test(lower)) {
    return PRIVATE_IPV4_RANGES.some((pattern) => pattern.test(lower));
  }
  return PRIVATE_IPV6_RANGES.some((pattern) => pattern.test(lower));
}

// Redirect hops followed before giving up
const MAX_REDIRECT_DEPTH = 5;

export type MetadataDigestStatus = "ok" | "timeout" | "error" | "oversize" | "invalid_json" | "blocked";

export interface MetadataDigestResult {
  status: MetadataDigestStatus;
  error?: string;
  bytes?: number;
  document?: Record<string, unknown>;
}

export interface MetadataFetchOptions {
  timeoutMs?: number;
  maxBytes?: number;
}

type LinkField = keyof TokenMetadata;

const LINK_FIELDS: readonly LinkField[] = ["image", "twitter", "telegram", "website"];

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert the URI schemes seen on token metadata to fetchable URLs
 */
export function convertToFetchUrl(uri: string): string | null {
  if (uri.startsWith("ipfs://")) {
    return `https://ipfs.io/ipfs/${uri.slice(7)}`;
  }
  if (uri.startsWith("/ipfs/")) {
    return `https://ipfs.io${uri}`;
  }
  if (uri.startsWith("ar://")) {
    return `https://arweave.net/${uri.slice(5)}`;
  }
  if (uri.startsWith("https://") || uri.startsWith("http://")) {
    return uri;
  }
  return null;
}

/**
 * Fetch a metadata URI and parse its JSON body.
 * Never throws: every failure is reported through `status`.
 * Redirects are followed by hand so every hop passes the host check.
 */
export async function digestMetadata(
  uri: string,
  options: MetadataFetchOptions = {},
  redirectDepth = 0
): Promise<MetadataDigestResult> {
  const timeoutMs = options.timeoutMs ?? config.metadataTimeoutMs;
  const maxBytes = options.maxBytes ?? config.metadataMaxBytes;

  if (redirectDepth >= MAX_REDIRECT_DEPTH) {
    return { status: "error", error: "Too many redirects" };
  }

  if (!uri) {
    return { status: "error", error: "Empty URI" };
  }

  const fetchUrl = convertToFetchUrl(uri);
  if (!fetchUrl) {
    return { status: "error", error: "Unsupported URI scheme" };
  }

  let url: URL;
  try {
    url = new URL(fetchUrl);
  } catch {
    return { status: "error", error: "Invalid URL" };
  }
  if (isBlockedHost(url.hostname)) {
    return { status: "blocked", error: "Internal host blocked" };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url.toString(), {
      signal: controller.signal,
      redirect: "manual",
      headers: {
        Accept: "application/json",
        "User-Agent": "pump-mint-harvester/1.0",
      },
    });

    if (response.status >= 300 && response.status < 400) {
      const location = response.headers.get("location");
      if (!location) {
        return { status: "error", error: `Redirect ${response.status} without location` };
      }

      let redirectUrl: URL;
      try {
        redirectUrl = new URL(location, url);
      } catch {
        return { status: "error", error: "Invalid redirect URL" };
      }
      if (isBlockedHost(redirectUrl.hostname)) {
        logger.warn({ uri, redirectTo: redirectUrl.hostname }, "Blocked redirect to internal host");
        return { status: "blocked", error: "Redirect to internal host blocked" };
      }

      return digestMetadata(redirectUrl.toString(), options, redirectDepth + 1);
    }

    if (!response.ok) {
      return { status: "error", error: `HTTP ${response.status}` };
    }

    const contentLength = response.headers.get("content-length");
    if (contentLength && parseInt(contentLength, 10) > maxBytes) {
      return { status: "oversize", bytes: parseInt(contentLength, 10) };
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return { status: "error", error: "No response body" };
    }

    const chunks: Uint8Array[] = [];
    let totalBytes = 0;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.length;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        return { status: "oversize", bytes: totalBytes };
      }
      chunks.push(value);
    }

    let json: unknown;
    try {
      json = JSON.parse(Buffer.concat(chunks).toString("utf-8"));
    } catch {
      return { status: "invalid_json", bytes: totalBytes };
    }

    if (!isJsonObject(json)) {
      return { status: "invalid_json", bytes: totalBytes, error: "Body is not a JSON object" };
    }

    return { status: "ok", bytes: totalBytes, document: json };
  } catch (error: unknown) {
    if (error instanceof Error) {
      if (error.name === "AbortError") {
        return { status: "timeout" };
      }
      return { status: "error", error: error.message };
    }
    return { status: "error", error: String(error) };
  } finally {
    clearTimeout(timeoutId);
  }
}

function hasHttpScheme(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://");
}

/**
 * Turn a handle or bare domain into an absolute link for its platform
 */
export function normalizeLink(field: LinkField, value: string): string {
  if (hasHttpScheme(value)) return value;

  switch (field) {
    case "twitter":
      return `https://twitter.com/${value.replace(/^@+/, "")}`;
    case "telegram":
      return `https://t.me/${value.replace(/^@+/, "")}`;
    case "website":
      return `https://${value}`;
    case "image":
      return value;
  }
}

export function emptyMetadata(): TokenMetadata {
  return {
    image: NOT_AVAILABLE,
    twitter: NOT_AVAILABLE,
    telegram: NOT_AVAILABLE,
    website: NOT_AVAILABLE,
  };
}

export function extractMetadata(document: Record<string, unknown>): TokenMetadata {
  const metadata = emptyMetadata();

  for (const field of LINK_FIELDS) {
    const raw = document[field];
    if (typeof raw !== "string" || raw.trim() === "") continue;
    metadata[field] = normalizeLink(field, raw.trim());
  }

  return metadata;
}

/**
 * Fetch the token's metadata document and return its normalized links.
 * Any failure yields "NA" for all four fields.
 */
export async function fetchTokenMetadata(uri: string, options: MetadataFetchOptions = {}): Promise<TokenMetadata> {
  const result = await digestMetadata(uri, options);

  if (result.status !== "ok" || !result.document) {
    logger.warn({ uri, status: result.status, error: result.error }, "Metadata unavailable, using NA");
    return emptyMetadata();
  }

  return extractMetadata(result.document);
}
