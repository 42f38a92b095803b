import { err, ok, type Result } from "neverthrow";
import {
  sourceFailures,
  type SourceFailure,
} from "../../../core/failures/sourceFailure";
import {
  transportFailures,
  type TransportFailure,
} from "../../../core/failures/transportFailure";
import type { MarketGroupSourcePort } from "../../../core/ports/inboundPorts";
import { DEFAULT_SNIPPET_LENGTH } from "../../../shared/text/displayText";
import {
  HttpTextClient,
  type HttpTextResponse,
} from "../../http/httpTextClient";

export type GammaMarketSourceOptions = {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  snippetMaxLength?: number;
};

const SERVICE_NAME = "Gamma";

const unavailableStatuses = new Set([502, 503, 504]);

const parseRetryAfter = (raw: string | undefined): number | undefined => {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return undefined;
  }

  return Number.parseInt(raw.trim(), 10);
};

/**
 * Fetches market-group events from the Gamma API and classifies domain-level responses as source failures.
 */
export class GammaMarketSource implements MarketGroupSourcePort {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly snippetMaxLength: number;

  constructor(
    private readonly baseUrl: string,
    options: GammaMarketSourceOptions = {},
    private readonly httpClient = new HttpTextClient(),
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.snippetMaxLength = options.snippetMaxLength ?? DEFAULT_SNIPPET_LENGTH;
  }

  async fetchMarketGroup(
    slug: string,
  ): Promise<Result<string, TransportFailure | SourceFailure>> {
    const trimmed = slug.trim();
    if (!trimmed) {
      return err(sourceFailures.marketGroupNotFound({ slug }));
    }

    const endpoint = `/events/slug/${encodeURIComponent(trimmed)}`;
    const url = `${this.baseUrl.replace(/\/+$/, "")}${endpoint}`;

    const response = await this.httpClient.requestText({
      url,
      method: "GET",
      headers: { accept: "application/json" },
      timeoutMs: this.timeoutMs,
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    });

    if (response.isErr()) {
      return err(response.error);
    }

    return this.classify(trimmed, endpoint, response.value);
  }

  private classify(
    slug: string,
    endpoint: string,
    response: HttpTextResponse,
  ): Result<string, TransportFailure | SourceFailure> {
    const { status } = response;

    if (status === 404) {
      return err(sourceFailures.marketGroupNotFound({ slug }));
    }

    if (status === 401 || status === 403) {
      return err(
        sourceFailures.authenticationFailed({
          reason: `${SERVICE_NAME} API rejected the request with status ${status}`,
        }),
      );
    }

    if (status === 429) {
      return err(
        sourceFailures.rateLimitExceeded({
          retryAfterSecs: parseRetryAfter(response.headers["retry-after"]),
        }),
      );
    }

    if (unavailableStatuses.has(status)) {
      return err(
        sourceFailures.apiUnavailable({
          serviceName: SERVICE_NAME,
          reason: `responded with status ${status}`,
        }),
      );
    }

    if (status < 200 || status >= 300) {
      return err(
        transportFailures.requestFailed(
          { status, url: response.url, body: response.body },
          { maxLength: this.snippetMaxLength },
        ),
      );
    }

    const body = response.body.trim();
    if (!body || body === "null") {
      return err(
        sourceFailures.invalidApiResponse(
          {
            endpoint,
            reason: "response body was empty",
            rawBody: response.body,
          },
          { maxLength: this.snippetMaxLength },
        ),
      );
    }

    return ok(response.body);
  }
}
