/**
 * Per-route fetch policies applied by the service worker.
 *
 * Kept free of worker globals: caches and fetch are passed in, so the same
 * code runs in the worker, in a page and under test.
 */

import { DEFAULT_AUTH_PATH_PREFIX } from "../types.ts";
import { classifyFetch, type FetchFn } from "./connectivity-classifier.ts";

/**
 * The subset of the Cache API the policies rely on.
 */
export interface CacheLike {
  match(request: RequestInfo | URL): Promise<Response | undefined>;
  put(request: RequestInfo | URL, response: Response): Promise<void>;
}

export interface CacheStorageLike {
  open(cacheName: string): Promise<CacheLike>;
  match(request: RequestInfo | URL): Promise<Response | undefined>;
}

export type RouteKind = "cross-origin" | "api" | "static" | "page";

export interface FetchPolicyOptions {
  cacheName: string;
  caches: CacheStorageLike;
  fetch: FetchFn;
  /** Origin of the application; anything else is cross-origin. */
  origin: string;
  offlineUrl?: string;
  apiPrefix?: string;
  authPathPrefix?: string;
}

export const DEFAULT_OFFLINE_URL = "/static/offline.html";
const DEFAULT_API_PREFIX = "/api/";

const STATIC_EXTENSIONS = [".css", ".js", ".woff2", ".woff", ".png", ".jpg", ".ico", ".svg"];

export function isStaticAsset(pathname: string): boolean {
  return (
    pathname.startsWith("/static/") ||
    STATIC_EXTENSIONS.some((extension) => pathname.endsWith(extension))
  );
}

/**
 * Decide which policy applies to a request.
 */
export function routeRequest(
  request: Request,
  origin: string,
  apiPrefix: string = DEFAULT_API_PREFIX,
): RouteKind {
  const url = new URL(request.url);

  if (url.origin !== origin) return "cross-origin";
  if (url.pathname.startsWith(apiPrefix)) return "api";
  if (isStaticAsset(url.pathname)) return "static";
  return "page";
}

function emptyResponse(status: number): Response {
  return new Response("", { status });
}

async function storeInCache(
  options: FetchPolicyOptions,
  request: Request,
  response: Response,
): Promise<void> {
  try {
    const cache = await options.caches.open(options.cacheName);
    await cache.put(request, response.clone());
  } catch (error) {
    console.warn("[stockline] Failed to cache", request.url, error);
  }
}

/**
 * Serve from cache when present; otherwise fetch and keep a copy.
 * A network error degrades to an empty response.
 */
export async function cacheFirst(
  request: Request,
  options: FetchPolicyOptions,
): Promise<Response> {
  const cached = await options.caches.match(request);
  if (cached) return cached;

  try {
    const response = await options.fetch(request);
    if (response.ok) {
      await storeInCache(options, request, response);
    }
    return response;
  } catch {
    return emptyResponse(408);
  }
}

/**
 * Network only, never cached. Failures are the caller's to handle.
 */
export function networkOnly(request: Request, options: FetchPolicyOptions): Promise<Response> {
  return options.fetch(request);
}

/**
 * Network only, never cached, failures swallowed.
 */
export async function crossOrigin(
  request: Request,
  options: FetchPolicyOptions,
): Promise<Response> {
  try {
    return await options.fetch(request);
  } catch {
    return emptyResponse(408);
  }
}

/**
 * Network first. A redirect to the login page or a dead network falls back
 * to the cached copy of the same request; the offline page is the last resort.
 */
export async function networkFirstWithFallback(
  request: Request,
  options: FetchPolicyOptions,
): Promise<Response> {
  const result = await classifyFetch(options.fetch, request, undefined, {
    authPathPrefix: options.authPathPrefix ?? DEFAULT_AUTH_PATH_PREFIX,
    // Navigations fetch with redirect: "manual"; an opaque redirect may go
    // anywhere, so hand it to the browser to follow.
    opaqueRedirect: "reachable",
  });

  if (result.outcome === "rejected") {
    // Server is up but could not load the session: keep the user on the
    // page they asked for instead of showing the login form.
    const cached = await options.caches.match(request);
    return cached ?? result.response;
  }

  if (result.outcome === "reachable") {
    if (result.response.ok) {
      await storeInCache(options, request, result.response);
    }
    return result.response;
  }

  const cached = await options.caches.match(request);
  if (cached) return cached;

  if (request.mode === "navigate") {
    const offlinePage = await options.caches.match(options.offlineUrl ?? DEFAULT_OFFLINE_URL);
    return (
      offlinePage ??
      new Response("<h1>Offline</h1>", {
        status: 503,
        headers: { "Content-Type": "text/html" },
      })
    );
  }

  return new Response("Offline", { status: 503 });
}

/**
 * Apply the policy for a request, or return null when the request should
 * not be intercepted at all (anything but GET).
 */
export function handleFetch(
  request: Request,
  options: FetchPolicyOptions,
): Promise<Response> | null {
  if (request.method !== "GET") {
    return null;
  }

  switch (routeRequest(request, options.origin, options.apiPrefix)) {
    case "cross-origin":
      return crossOrigin(request, options);
    case "api":
      return networkOnly(request, options);
    case "static":
      return cacheFirst(request, options);
    case "page":
      return networkFirstWithFallback(request, options);
  }
}
