import type { IncomingMessage, RequestListener, ServerResponse } from "node:http";
import { describeError } from "../errors.js";

/**
 * Response computed by a redirect policy.
 */
export interface RedirectResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type RedirectPolicy = (host: string | undefined, requestUrl: string | undefined) => RedirectResponse;

/** Characters that cannot appear in an authority taken from a Host header */
const INVALID_AUTHORITY = /[\s/?#@\\]/;

function statusOnly(status: number, body: string): RedirectResponse {
  return { status, headers: { "content-type": "text/plain; charset=utf-8" }, body };
}

/** `scheme://` prefix of an absolute-form request target */
const ABSOLUTE_FORM = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Redirect a request to the HTTPS equivalent of its URL: same authority, path
 * and query. An absolute-form target supplies the path and query, and the
 * authority when there is no Host header.
 *
 * - no usable host: 404
 * - the target URI cannot be rebuilt: 500
 * - otherwise: 301 with a `Location` header
 */
export function redirectToHttps(host: string | undefined, requestUrl: string | undefined): RedirectResponse {
  let path = requestUrl ?? "/";
  console.warn(`[Redirect] Redirecting to HTTPS, request path: ${path}`);

  let authority = host;
  if (ABSOLUTE_FORM.test(path)) {
    let target: URL;
    try {
      target = new URL(path);
    } catch (error) {
      console.error(`[Redirect] Could not redirect to HTTPS: failed to parse "${path}": ${describeError(error)}`);
      return statusOnly(500, "Internal Server Error");
    }
    path = `${target.pathname}${target.search}`;
    if (authority === undefined || authority.length === 0) {
      authority = target.host;
    }
  }

  if (authority === undefined || authority.length === 0) {
    console.warn("[Redirect] Could not redirect to HTTPS: no authority");
    return statusOnly(404, "Not Found");
  }

  if (!path.startsWith("/") || INVALID_AUTHORITY.test(authority)) {
    console.error(`[Redirect] Could not redirect to HTTPS: cannot build a URI from "${authority}" and "${path}"`);
    return statusOnly(500, "Internal Server Error");
  }

  const queryStart = path.indexOf("?");
  const pathname = queryStart === -1 ? path : path.slice(0, queryStart);
  const query = queryStart === -1 ? "" : path.slice(queryStart + 1);
  const location = query.length === 0 ? `https://${authority}${pathname}` : `https://${authority}${pathname}?${query}`;

  try {
    new URL(location);
  } catch (error) {
    console.error(`[Redirect] Could not redirect to HTTPS: failed to build URI: ${describeError(error)}`);
    return statusOnly(500, "Internal Server Error");
  }

  return { status: 301, headers: { location }, body: "" };
}

/**
 * Request handler answering every request with a redirect computed by `policy`.
 * If the policy itself throws, the client gets a 500 explaining that it should
 * switch to HTTPS by hand.
 */
export function createRedirectHandler(policy: RedirectPolicy = redirectToHttps): RequestListener {
  return (req: IncomingMessage, res: ServerResponse) => {
    let response: RedirectResponse;
    try {
      response = policy(req.headers.host, req.url);
    } catch (error) {
      console.warn(`[Redirect] Redirecting to HTTPS failed: ${describeError(error)}`);
      response = statusOnly(
        500,
        `Please use HTTPS instead of HTTP, automatic redirection failed: ${describeError(error)}`,
      );
    }
    res.writeHead(response.status, response.headers);
    res.end(response.body);
  };
}
