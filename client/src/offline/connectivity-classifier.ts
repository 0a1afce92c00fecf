/**
 * Classifies network attempts into reachable, rejected or unreachable.
 *
 * "Rejected" covers a server that answered but bounced the request to the
 * login page, typically because the session could not be loaded. Fetch
 * follows that redirect transparently, so the status code alone looks like
 * success; only the redirect metadata tells the two apart.
 */

import { DEFAULT_AUTH_PATH_PREFIX } from "../types.ts";

export type ConnectivityOutcome = "reachable" | "rejected" | "unreachable";

export interface ClassifierOptions {
  /** Path prefix of the login page the server redirects to. */
  authPathPrefix?: string;
  /**
   * Outcome for an opaque redirect, whose target is hidden. "rejected" suits
   * requests that only ever redirect to the login page, such as the probe.
   */
  opaqueRedirect?: "rejected" | "reachable";
}

export type FetchClassification =
  | { outcome: "reachable"; response: Response }
  | { outcome: "rejected"; response: Response }
  | { outcome: "unreachable"; error: unknown };

export type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

// Base for resolving relative Location headers when the response has no URL.
const FALLBACK_BASE = "http://localhost";

/**
 * Check whether a URL (absolute or relative) points at the login page.
 */
export function isAuthUrl(
  url: string,
  authPathPrefix: string = DEFAULT_AUTH_PATH_PREFIX,
  base: string = FALLBACK_BASE,
): boolean {
  if (!url) return false;
  try {
    return new URL(url, base || FALLBACK_BASE).pathname.startsWith(authPathPrefix);
  } catch {
    return false;
  }
}

/**
 * Classify a response that was received from the server.
 */
export function classifyResponse(
  response: Response,
  options: ClassifierOptions = {},
): "reachable" | "rejected" {
  const prefix = options.authPathPrefix ?? DEFAULT_AUTH_PATH_PREFIX;

  // Redirect followed by fetch: the final URL is the login page.
  if (response.redirected && isAuthUrl(response.url, prefix)) {
    return "rejected";
  }

  // redirect: "manual" in a browser hides the target entirely.
  if (response.type === "opaqueredirect") {
    return options.opaqueRedirect ?? "rejected";
  }

  // redirect: "manual" outside a browser exposes the 3xx and its Location.
  if (response.status >= 300 && response.status < 400) {
    const location = response.headers.get("Location");
    if (location && isAuthUrl(location, prefix, response.url)) {
      return "rejected";
    }
  }

  return "reachable";
}

/**
 * Perform a fetch and classify its outcome. Never rejects.
 */
export async function classifyFetch(
  fetchFn: FetchFn,
  input: RequestInfo | URL,
  init?: RequestInit,
  options: ClassifierOptions = {},
): Promise<FetchClassification> {
  let response: Response;
  try {
    response = await fetchFn(input, init);
  } catch (error) {
    return { outcome: "unreachable", error };
  }

  return classifyResponse(response, options) === "rejected"
    ? { outcome: "rejected", response }
    : { outcome: "reachable", response };
}

/**
 * Fetch through whatever `globalThis.fetch` is at call time.
 */
export const globalFetch: FetchFn = (input, init) => globalThis.fetch(input, init);
