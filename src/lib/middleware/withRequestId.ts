// /src/lib/middleware/withRequestId.ts

import { generateRequestId, runWithRequestId } from "../requestId";

/** Read from the request and written to the response. Header lookups are case-insensitive. */
export const REQUEST_ID_HEADER = "X-Request-ID";

type RouteHandler<A extends unknown[]> = (req: Request, ...rest: A) => Response | Promise<Response>;

/**
 * Wrap an App Router route handler so every request carries exactly one id:
 * - reuse the incoming X-Request-ID when present, otherwise generate one
 * - the handler sees it on its request and via getRequestId()
 * - the response echoes it in X-Request-ID
 */
export function withRequestId<A extends unknown[]>(
  handler: RouteHandler<A>,
): (req: Request, ...rest: A) => Promise<Response> {
  return async (req: Request, ...rest: A) => {
    const incoming = req.headers.get(REQUEST_ID_HEADER)?.trim();
    const requestId = incoming ? incoming : generateRequestId();

    const forwarded = incoming ? req : withHeader(req, requestId);
    const res = await runWithRequestId(requestId, () => handler(forwarded, ...rest));

    return setResponseRequestId(res, requestId);
  };
}

/** Id attached by withRequestId, or "" when the request did not pass through it. */
export function getRequestIdFromRequest(req: Request): string {
  return req.headers.get(REQUEST_ID_HEADER) ?? "";
}

function withHeader(req: Request, requestId: string): Request {
  const headers = new Headers(req.headers);
  headers.set(REQUEST_ID_HEADER, requestId);
  return new Request(req, { headers });
}

function setResponseRequestId(res: Response, requestId: string): Response {
  try {
    res.headers.set(REQUEST_ID_HEADER, requestId);
    return res;
  } catch (err) {
    // Responses from fetch() / Response.redirect() have immutable headers.
    if (!(err instanceof TypeError)) throw err;

    const headers = new Headers(res.headers);
    headers.set(REQUEST_ID_HEADER, requestId);
    return new Response(res.body, { status: res.status, statusText: res.statusText, headers });
  }
}
