import { err, ok, type Result } from "neverthrow";
import {
  transportFailures,
  type TransportFailure,
} from "../../core/failures/transportFailure";
import { logger } from "../../shared/logger/logger";

type HttpMethod = "GET" | "POST";

export type HttpTextRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

/**
 * Any HTTP response, successful or not; mapping statuses to meaning belongs to the caller.
 */
export type HttpTextResponse = {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
};

const retryableStatuses = new Set([502, 503, 504]);

const describeCause = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }

  return error.message || error.name;
};

const validateUrl = (url: string): Result<URL, TransportFailure> => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    return err(transportFailures.invalidUrl({ url, reason: describeCause(error) }));
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return err(
      transportFailures.invalidUrl({
        url,
        reason: `unsupported protocol '${parsed.protocol}'`,
      }),
    );
  }

  return ok(parsed);
};

/**
 * Centralizes HTTP text IO so adapters share one timeout/retry policy and one transport failure vocabulary.
 */
export class HttpTextClient {
  /**
   * Executes requests with bounded retries on connection faults, timeouts and gateway statuses.
   */
  async requestText(
    request: HttpTextRequest,
  ): Promise<Result<HttpTextResponse, TransportFailure>> {
    const validated = validateUrl(request.url);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const maxAttempts = request.retries + 1;
    let attempt = 1;

    for (;;) {
      const response = await this.performRequest(request);
      const retryable = response.match(
        (value) => retryableStatuses.has(value.status),
        (failure) =>
          failure.kind === "connection_failed" || failure.kind === "timeout",
      );

      if (!retryable || attempt >= maxAttempts) {
        return response;
      }

      logger.debug(
        { url: request.url, attempt, maxAttempts },
        "Retrying HTTP request",
      );
      await this.delay(request.retryDelayMs * attempt);
      attempt += 1;
    }
  }

  private async performRequest(
    request: HttpTextRequest,
  ): Promise<Result<HttpTextResponse, TransportFailure>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          return err(
            transportFailures.timeout({
              url: request.url,
              durationSecs: Math.ceil(request.timeoutMs / 1_000),
            }),
          );
        }

        return err(
          transportFailures.connectionFailed({
            url: request.url,
            reason: describeCause(error),
          }),
        );
      }

      try {
        const body = await response.text();
        return ok({
          url: request.url,
          status: response.status,
          headers: Object.fromEntries(response.headers.entries()),
          body,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          return err(
            transportFailures.timeout({
              url: request.url,
              durationSecs: Math.ceil(request.timeoutMs / 1_000),
            }),
          );
        }

        return err(
          transportFailures.responseReadError({
            url: request.url,
            reason: describeCause(error),
          }),
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
