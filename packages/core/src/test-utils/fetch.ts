type FetchFn = typeof globalThis.fetch;

type FetchInput = Parameters<FetchFn>[0];
type FetchInit = Parameters<FetchFn>[1];

export type RecordedRequest = {
  method: string;
  url: string;
  headers: Headers;
  body: string | null;
};

export type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function getFetchUrl(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function getFetchMethod(input: FetchInput, init?: FetchInit): string {
  return init?.method ?? (input instanceof Request ? input.method : "GET");
}

function readBody(init?: FetchInit): string | null {
  const body = init?.body;
  if (typeof body === "string") return body;
  if (body instanceof URLSearchParams) return body.toString();
  return null;
}

/**
 * In-process fetch keyed by `METHOD url`.
 * Unknown routes reject like a refused connection.
 */
export function createFetchStub(routes: Record<string, RouteHandler> = {}) {
  const requests: RecordedRequest[] = [];
  const table = new Map(Object.entries(routes));

  const fetchStub: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      method: getFetchMethod(input, init),
      url: getFetchUrl(input),
      headers: new Headers(init?.headers),
      body: readBody(init),
    };
    requests.push(request);

    const handler = table.get(`${request.method} ${request.url}`);
    if (!handler) {
      throw new TypeError(`fetch failed: ${request.method} ${request.url}`);
    }
    return handler(request);
  };

  return { fetch: fetchStub, requests };
}

export function jsonResponse(body: unknown, init: ResponseInit = {}) {
  return Response.json(body, init);
}
