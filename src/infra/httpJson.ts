import { setTimeout as delay } from "node:timers/promises";

/** Error code emitted when the remote endpoint answers with a non-success status. */
export const ERROR_HTTP_STATUS = "E-HTTP-STATUS" as const;
/** Error code emitted when the body is not the JSON the caller expects. */
export const ERROR_HTTP_SCHEMA = "E-HTTP-SCHEMA" as const;
/** Error code emitted for network failures and timeouts. */
export const ERROR_HTTP_NETWORK = "E-HTTP-NETWORK" as const;
/** Error code emitted when the caller's signal aborted the request. */
export const ERROR_HTTP_ABORTED = "E-HTTP-ABORTED" as const;

export type HttpErrorCode =
  | typeof ERROR_HTTP_STATUS
  | typeof ERROR_HTTP_SCHEMA
  | typeof ERROR_HTTP_NETWORK
  | typeof ERROR_HTTP_ABORTED;

/** Error thrown by {@link postJson} once retries are exhausted. */
export class HttpCollaboratorError extends Error {
  public readonly code: HttpErrorCode;
  public readonly status: number | null;

  constructor(message: string, options: { code: HttpErrorCode; status?: number | null; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "HttpCollaboratorError";
    this.code = options.code;
    this.status = options.status ?? null;
  }
}

/** Statuses worth another attempt: rate limiting and gateway hiccups. */
function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

export interface PostJsonOptions {
  readonly timeoutMs: number;
  /** Additional attempts after the first one for retriable failures. */
  readonly maxRetries: number;
  readonly bearerToken?: string | null;
  readonly signal?: AbortSignal;
  readonly fetchImpl?: typeof fetch;
}

/**
 * POSTs {@link body} as JSON and returns the parsed JSON response. Retriable
 * statuses and network errors are retried with a small linear backoff;
 * schema-level problems and caller aborts are not.
 */
export async function postJson(url: URL | string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers = new Headers({ Accept: "application/json", "Content-Type": "application/json" });
  if (options.bearerToken) {
    headers.set("Authorization", `Bearer ${options.bearerToken}`);
  }
  const payload = JSON.stringify(body);
  const maxAttempts = Math.max(1, options.maxRetries + 1);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const response = await performRequest(fetchImpl, url, headers, payload, options);
      return await parseResponse(response);
    } catch (error) {
      lastError = error;
      const retriable =
        error instanceof HttpCollaboratorError &&
        (error.code === ERROR_HTTP_NETWORK ||
          (error.code === ERROR_HTTP_STATUS && isRetriableStatus(error.status ?? 0)));
      if (!retriable || attempt >= maxAttempts) {
        throw error;
      }
      await delay(150 * attempt, undefined, options.signal ? { signal: options.signal } : undefined);
    }
  }

  throw new HttpCollaboratorError("request failed after retries", { code: ERROR_HTTP_NETWORK, cause: lastError });
}

async function performRequest(
  fetchImpl: typeof fetch,
  url: URL | string,
  headers: Headers,
  payload: string,
  options: PostJsonOptions,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const response = await fetchImpl(url, { method: "POST", headers, body: payload, signal: controller.signal });
    if (!response.ok) {
      throw new HttpCollaboratorError(`endpoint responded with HTTP ${response.status}`, {
        code: ERROR_HTTP_STATUS,
        status: response.status,
      });
    }
    return response;
  } catch (error) {
    if (error instanceof HttpCollaboratorError) {
      throw error;
    }
    if (options.signal?.aborted) {
      throw new HttpCollaboratorError("request aborted by caller", { code: ERROR_HTTP_ABORTED, cause: error });
    }
    if (controller.signal.aborted) {
      throw new HttpCollaboratorError(`request timed out after ${options.timeoutMs}ms`, {
        code: ERROR_HTTP_NETWORK,
        cause: error,
      });
    }
    throw new HttpCollaboratorError("request failed", { code: ERROR_HTTP_NETWORK, cause: error });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

async function parseResponse(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) {
    throw new HttpCollaboratorError("endpoint returned a non-JSON payload", {
      code: ERROR_HTTP_SCHEMA,
      status: response.status,
    });
  }
  try {
    return await response.json();
  } catch (error) {
    throw new HttpCollaboratorError("unable to parse JSON payload", {
      code: ERROR_HTTP_SCHEMA,
      status: response.status,
      cause: error,
    });
  }
}
