import {
  DEFAULT_SNIPPET_LENGTH,
  truncateForDisplay,
} from "../../shared/text/displayText";
import {
  sealFailure,
  type FailureFields,
  type SnippetOptions,
} from "./failureValue";

export const transportFailureKinds = [
  "request_failed",
  "connection_failed",
  "timeout",
  "invalid_url",
  "response_read_error",
] as const;

export type TransportFailureKind = (typeof transportFailureKinds)[number];

/**
 * Every transport failure names the exact URL attempted, never a redacted form.
 */
export type RequestFailed = {
  readonly kind: "request_failed";
  readonly status: number;
  readonly url: string;
  readonly body: string;
};

export type ConnectionFailed = {
  readonly kind: "connection_failed";
  readonly url: string;
  readonly reason: string;
};

export type TransportTimeout = {
  readonly kind: "timeout";
  readonly url: string;
  readonly durationSecs: number;
};

export type InvalidUrl = {
  readonly kind: "invalid_url";
  readonly url: string;
  readonly reason: string;
};

export type ResponseReadError = {
  readonly kind: "response_read_error";
  readonly url: string;
  readonly reason: string;
};

export type TransportFailure =
  | RequestFailed
  | ConnectionFailed
  | TransportTimeout
  | InvalidUrl
  | ResponseReadError;

const transportKindSet: ReadonlySet<string> = new Set(transportFailureKinds);

export const isTransportFailure = (value: {
  readonly kind: string;
}): value is TransportFailure => transportKindSet.has(value.kind);

const isHttpStatus = (status: number): boolean =>
  Number.isInteger(status) && status >= 100 && status <= 599;

export const transportFailures = {
  /**
   * Rejects status codes outside 100-599: only the transport builds this variant, so a bad code is a bug there.
   */
  requestFailed: (
    fields: FailureFields<RequestFailed>,
    options: SnippetOptions = {},
  ): RequestFailed => {
    if (!isHttpStatus(fields.status)) {
      throw new RangeError(`Invalid HTTP status code: ${fields.status}`);
    }

    return sealFailure<RequestFailed>({
      kind: "request_failed",
      status: fields.status,
      url: fields.url,
      body: truncateForDisplay(
        fields.body,
        options.maxLength ?? DEFAULT_SNIPPET_LENGTH,
      ),
    });
  },
  connectionFailed: (fields: FailureFields<ConnectionFailed>): ConnectionFailed =>
    sealFailure<ConnectionFailed>({
      kind: "connection_failed",
      url: fields.url,
      reason: fields.reason,
    }),
  timeout: (fields: FailureFields<TransportTimeout>): TransportTimeout =>
    sealFailure<TransportTimeout>({
      kind: "timeout",
      url: fields.url,
      durationSecs: fields.durationSecs,
    }),
  invalidUrl: (fields: FailureFields<InvalidUrl>): InvalidUrl =>
    sealFailure<InvalidUrl>({
      kind: "invalid_url",
      url: fields.url,
      reason: fields.reason,
    }),
  responseReadError: (
    fields: FailureFields<ResponseReadError>,
  ): ResponseReadError =>
    sealFailure<ResponseReadError>({
      kind: "response_read_error",
      url: fields.url,
      reason: fields.reason,
    }),
};

export const describeTransportFailure = (failure: TransportFailure): string => {
  switch (failure.kind) {
    case "request_failed":
      return `HTTP request failed with status ${failure.status}: ${failure.url}\nResponse: ${failure.body}`;
    case "connection_failed":
      return `Failed to connect to ${failure.url}: ${failure.reason}`;
    case "timeout":
      return `Request to ${failure.url} timed out after ${failure.durationSecs} seconds`;
    case "invalid_url":
      return `Invalid URL '${failure.url}': ${failure.reason}`;
    case "response_read_error":
      return `Failed to read response from ${failure.url}: ${failure.reason}`;
  }
};
