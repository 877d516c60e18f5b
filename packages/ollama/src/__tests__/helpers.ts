import { vi } from "vitest";

export function ndjsonResponse(objects: unknown[], status = 200): Response {
  return new Response(objects.map((object) => JSON.stringify(object)).join("\n") + "\n", {
    status,
    headers: { "Content-Type": "application/x-ndjson" },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/**
 * URL and parsed JSON body of the nth fetch call.
 */
export function fetchCall(fetchMock: ReturnType<typeof stubFetch>, n = 0): { url: string; body: unknown } {
  const call = fetchMock.mock.calls[n];
  return {
    url: String(call?.[0]),
    body: JSON.parse(String(call?.[1]?.body)),
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
