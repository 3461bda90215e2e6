export interface CapturedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

type FetchHandler = (request: CapturedRequest) => { status?: number; body: unknown };

const readHeaders = (init?: RequestInit): Record<string, string> => {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

export const withStubbedFetch = async (handler: FetchHandler, fn: () => Promise<void>): Promise<void> => {
  const original = globalThis.fetch;
  globalThis.fetch = async (...args: Parameters<typeof fetch>): Promise<Response> => {
    const [input, init] = args;
    const rawBody = typeof init?.body === "string" ? init.body : "";
    const reply = handler({
      url: String(input),
      headers: readHeaders(init),
      body: rawBody ? JSON.parse(rawBody) : undefined,
    });
    const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, {
      status: reply.status ?? 200,
      headers: { "content-type": "application/json" },
    });
  };

  try {
    await fn();
  } finally {
    globalThis.fetch = original;
  }
};
