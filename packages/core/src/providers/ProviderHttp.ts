import { ProviderError } from "./ProviderTypes.js";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

export const parseToolArgs = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

export interface PostJsonOptions {
  label: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * POSTs a JSON body and returns the decoded reply. The request is aborted when
 * either the caller's signal fires or `timeoutMs` elapses.
 */
export const postJson = async (options: PostJsonOptions): Promise<unknown> => {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    let response: Response;
    try {
      response = await fetch(options.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...options.headers },
        body: JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new ProviderError("provider_timeout", `${options.label} request timed out after ${options.timeoutMs}ms`);
      }
      if (controller.signal.aborted) {
        throw new ProviderError("provider_aborted", `${options.label} request aborted`);
      }
      throw new ProviderError(
        "provider_http",
        `${options.label} request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(
        "provider_http",
        `${options.label} error ${response.status}: ${errorBody}`,
        response.status,
      );
    }
    try {
      return await response.json();
    } catch (error) {
      throw new ProviderError(
        "provider_response",
        `${options.label} returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onAbort);
  }
};
