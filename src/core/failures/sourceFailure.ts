import {
  DEFAULT_SNIPPET_LENGTH,
  jsonErrorSnippet,
} from "../../shared/text/displayText";
import {
  sealFailure,
  type FailureFields,
  type SnippetOptions,
} from "./failureValue";

export const sourceFailureKinds = [
  "market_group_not_found",
  "market_not_found",
  "invalid_api_response",
  "rate_limit_exceeded",
  "authentication_failed",
  "api_unavailable",
] as const;

export type SourceFailureKind = (typeof sourceFailureKinds)[number];

/**
 * Not-found variants describe absence and carry no response body.
 */
export type MarketGroupNotFound = {
  readonly kind: "market_group_not_found";
  readonly slug: string;
};

export type MarketNotFound = {
  readonly kind: "market_not_found";
  readonly groupSlug: string;
  readonly marketSlug: string;
};

export type InvalidApiResponse = {
  readonly kind: "invalid_api_response";
  readonly endpoint: string;
  readonly reason: string;
  readonly rawSnippet: string;
};

export type RateLimitExceeded = {
  readonly kind: "rate_limit_exceeded";
  readonly retryAfterSecs?: number;
};

export type AuthenticationFailed = {
  readonly kind: "authentication_failed";
  readonly reason: string;
};

export type ApiUnavailable = {
  readonly kind: "api_unavailable";
  readonly serviceName: string;
  readonly reason: string;
};

export type SourceFailure =
  | MarketGroupNotFound
  | MarketNotFound
  | InvalidApiResponse
  | RateLimitExceeded
  | AuthenticationFailed
  | ApiUnavailable;

const sourceKindSet: ReadonlySet<string> = new Set(sourceFailureKinds);

export const isSourceFailure = (value: {
  readonly kind: string;
}): value is SourceFailure => sourceKindSet.has(value.kind);

export type InvalidApiResponseInput = {
  endpoint: string;
  reason: string;
  rawBody: string;
};

export const sourceFailures = {
  marketGroupNotFound: (
    fields: FailureFields<MarketGroupNotFound>,
  ): MarketGroupNotFound =>
    sealFailure<MarketGroupNotFound>({
      kind: "market_group_not_found",
      slug: fields.slug,
    }),
  marketNotFound: (fields: FailureFields<MarketNotFound>): MarketNotFound =>
    sealFailure<MarketNotFound>({
      kind: "market_not_found",
      groupSlug: fields.groupSlug,
      marketSlug: fields.marketSlug,
    }),
  /**
   * Takes the raw body and keeps only a bounded snippet of it.
   */
  invalidApiResponse: (
    input: InvalidApiResponseInput,
    options: SnippetOptions = {},
  ): InvalidApiResponse =>
    sealFailure<InvalidApiResponse>({
      kind: "invalid_api_response",
      endpoint: input.endpoint,
      reason: input.reason,
      rawSnippet: jsonErrorSnippet(
        input.rawBody,
        options.maxLength ?? DEFAULT_SNIPPET_LENGTH,
        input.reason,
      ),
    }),
  rateLimitExceeded: (
    fields: FailureFields<RateLimitExceeded> = {},
  ): RateLimitExceeded =>
    sealFailure<RateLimitExceeded>(
      fields.retryAfterSecs === undefined
        ? { kind: "rate_limit_exceeded" }
        : { kind: "rate_limit_exceeded", retryAfterSecs: fields.retryAfterSecs },
    ),
  authenticationFailed: (
    fields: FailureFields<AuthenticationFailed>,
  ): AuthenticationFailed =>
    sealFailure<AuthenticationFailed>({
      kind: "authentication_failed",
      reason: fields.reason,
    }),
  apiUnavailable: (fields: FailureFields<ApiUnavailable>): ApiUnavailable =>
    sealFailure<ApiUnavailable>({
      kind: "api_unavailable",
      serviceName: fields.serviceName,
      reason: fields.reason,
    }),
};

export const describeSourceFailure = (failure: SourceFailure): string => {
  switch (failure.kind) {
    case "market_group_not_found":
      return `Market group '${failure.slug}' not found`;
    case "market_not_found":
      return `Market '${failure.marketSlug}' not found in group '${failure.groupSlug}'`;
    case "invalid_api_response":
      return `API endpoint '${failure.endpoint}' returned invalid response: ${failure.reason}\nResponse: ${failure.rawSnippet}`;
    case "rate_limit_exceeded":
      return failure.retryAfterSecs === undefined
        ? "API rate limit exceeded"
        : `API rate limit exceeded. Retry after ${failure.retryAfterSecs} seconds`;
    case "authentication_failed":
      return `API authentication failed: ${failure.reason}`;
    case "api_unavailable":
      return `${failure.serviceName} API is unavailable: ${failure.reason}`;
  }
};
