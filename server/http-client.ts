import type { z } from "zod";
import { ExternalApiError, errorMessage } from "./errors";

type Service = ExternalApiError["service"];

export interface JsonRequest {
  method?: "GET" | "POST" | "PUT";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

const MAX_RETRIES = 3;

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch + timeout + zod validation. Every failure (network, timeout, non-2xx,
 * unexpected body) surfaces as ExternalApiError, except a caller abort which
 * rethrows the AbortError so cancellation can be told apart from a failure.
 */
export async function requestJson<T extends z.ZodTypeAny>(
  service: Service,
  url: string,
  schema: T,
  req: JsonRequest,
): Promise<z.infer<T>> {
  const timeout = AbortSignal.timeout(req.timeoutMs);
  const signal = req.signal ? AbortSignal.any([req.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url, {
      method: req.method ?? "GET",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...req.headers,
      },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal,
    });
  } catch (error) {
    if (req.signal?.aborted) throw error;
    if (timeout.aborted) {
      throw new ExternalApiError(service, `${service} request timed out after ${req.timeoutMs}ms`);
    }
    throw new ExternalApiError(service, `${service} request failed: ${errorMessage(error)}`);
  }

  const text = await response.text();
  if (!response.ok) {
    throw new ExternalApiError(
      service,
      `${service} API error: ${response.status} ${response.statusText}`,
      response.status,
      text.slice(0, 500),
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ExternalApiError(service, `${service} returned a non-JSON body`, response.status, text.slice(0, 500));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExternalApiError(
      service,
      `${service} returned an unexpected body${issue ? ` (${issue.path.join(".")}: ${issue.message})` : ""}`,
      response.status,
      text.slice(0, 500),
    );
  }
  return parsed.data;
}

/**
 * Retry with exponential backoff (1s, 2s, ... capped at 10s). Only for
 * reads: batch writes are not idempotent on the remote side.
 */
export async function withRetry<T>(label: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= MAX_RETRIES || signal?.aborted || !isRetryable(err)) throw err;
      const delayMs = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
      console.warn(`[HttpClient] ${label} attempt ${attempt} failed, retrying in ${delayMs}ms: ${errorMessage(err)}`);
      await delay(delayMs);
    }
  }
}

function isRetryable(err: unknown): boolean {
  if (!(err instanceof ExternalApiError)) return false;
  return err.status === undefined || err.status === 429 || err.status >= 500;
}

export function basicAuth(user: string, pass: string): string {
  return `Basic ${Buffer.from(`${user}:${pass}`).toString("base64")}`;
}
