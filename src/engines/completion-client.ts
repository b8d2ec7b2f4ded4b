import type { Config } from "../config.js";
import { TransportError } from "../errors.js";
import type { CompletionRequest } from "./prompt.js";

export interface CompletionResponse {
  status: number;
  body: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// fetch rejects with a DOMException named TimeoutError once the signal fires
function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Sends one chat completion request. There is no retry: a timeout, a
 * connection failure or any status other than 200 throws `TransportError`.
 */
export async function sendCompletion(
  request: CompletionRequest,
  credential: string,
  config: Pick<Config, "url" | "timeoutMs" | "headers">,
  fetchImpl: FetchLike = fetch
): Promise<CompletionResponse> {
  // Header names are case-insensitive; set() replaces any configured variant
  const headers = new Headers(config.headers);
  headers.set("Content-Type", "application/json");
  headers.set("Authorization", `Bearer ${credential}`);

  let response: Response;
  try {
    response = await fetchImpl(config.url, {
      method: "POST",
      headers,
      body: JSON.stringify(request),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new TransportError(
        undefined,
        `request timed out after ${config.timeoutMs}ms`,
        { cause: error }
      );
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new TransportError(undefined, `cannot reach ${config.url}: ${detail}`, {
      cause: error,
    });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new TransportError(response.status, "could not read response body", {
      cause: error,
    });
  }

  if (response.status !== 200) {
    throw new TransportError(response.status, body);
  }

  return { status: response.status, body };
}
