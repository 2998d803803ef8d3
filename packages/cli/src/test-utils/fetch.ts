type FetchFn = typeof globalThis.fetch;

type FetchInput = Parameters<FetchFn>[0];
type FetchInit = Parameters<FetchFn>[1];

export function getFetchUrl(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function getFetchMethod(input: FetchInput, init?: FetchInit): string {
  return init?.method ?? (input instanceof Request ? input.method : "GET");
}

export function formatFetchCall(input: FetchInput, init?: FetchInit): string {
  return `${getFetchMethod(input, init)} ${getFetchUrl(input)}`;
}

export type MockHandler = {
  /** `METHOD url`, or a bare url for GET */
  request: string;
  handler: () => { status?: number; body: unknown; contentType?: string };
};

/**
 * Fetch answering from a fixed handler list; handlers can be hit any
 * number of times. `calls` records every request in order.
 */
export function mockFetchSequence(handlers: MockHandler[]) {
  const calls: string[] = [];
  const table = new Map<string, MockHandler["handler"]>();
  for (const { request, handler } of handlers) {
    table.set(request.includes(" ") ? request : `GET ${request}`, handler);
  }

  const fetch: FetchFn = async (input, init) => {
    const call = formatFetchCall(input, init);
    calls.push(call);

    const handler = table.get(call);
    if (!handler) {
      throw new TypeError(`Unmocked fetch: ${call}`);
    }

    const result = handler();
    return new Response(JSON.stringify(result.body), {
      status: result.status ?? 200,
      headers: { "Content-Type": result.contentType ?? "application/json" },
    });
  };

  return { fetch, calls };
}

/** Fetch that fails every request like an unreachable host */
export function denyUnmockedFetch(): FetchFn {
  return async (input, init) => {
    throw new TypeError(`Unmocked fetch: ${formatFetchCall(input, init)}`);
  };
}
