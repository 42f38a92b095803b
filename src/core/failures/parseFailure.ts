import {
  DEFAULT_SNIPPET_LENGTH,
  jsonErrorSnippet,
  truncateForDisplay,
} from "../../shared/text/displayText";
import { sealFailure, type SnippetOptions } from "./failureValue";

export const parseFailureKinds = [
  "json_deserialization_failed",
  "missing_field",
  "invalid_field_format",
  "invalid_array_length",
  "invalid_number",
] as const;

export type ParseFailureKind = (typeof parseFailureKinds)[number];

/**
 * `fieldName` is absent only when the whole payload failed to deserialize.
 */
export type JsonDeserializationFailed = {
  readonly kind: "json_deserialization_failed";
  readonly fieldName?: string;
  readonly expectedType: string;
  readonly jsonSnippet: string;
  readonly reason: string;
};

export type MissingField = {
  readonly kind: "missing_field";
  readonly fieldName: string;
  readonly parentType: string;
};

export type InvalidFieldFormat = {
  readonly kind: "invalid_field_format";
  readonly fieldName: string;
  readonly expectedFormat: string;
  readonly actual: string;
};

export type InvalidArrayLength = {
  readonly kind: "invalid_array_length";
  readonly fieldName: string;
  readonly expected: number;
  readonly actual: number;
};

export type InvalidNumber = {
  readonly kind: "invalid_number";
  readonly fieldName: string;
  readonly rawValue: string;
  readonly reason: string;
};

export type ParseFailure =
  | JsonDeserializationFailed
  | MissingField
  | InvalidFieldFormat
  | InvalidArrayLength
  | InvalidNumber;

const parseKindSet: ReadonlySet<string> = new Set(parseFailureKinds);

export const isParseFailure = (value: {
  readonly kind: string;
}): value is ParseFailure => parseKindSet.has(value.kind);

export type JsonDeserializationInput = {
  fieldName?: string;
  expectedType: string;
  json: string;
  reason: string;
};

export type InvalidFieldFormatInput = {
  fieldName: string;
  expectedFormat: string;
  actual: string;
};

export type InvalidNumberInput = {
  fieldName: string;
  rawValue: string;
  reason: string;
};

// Raw text from the wire is bounded here, so no caller can embed it verbatim.
export const parseFailures = {
  jsonDeserializationFailed: (
    input: JsonDeserializationInput,
    options: SnippetOptions = {},
  ): JsonDeserializationFailed => {
    const jsonSnippet = jsonErrorSnippet(
      input.json,
      options.maxLength ?? DEFAULT_SNIPPET_LENGTH,
      input.reason,
    );

    return sealFailure<JsonDeserializationFailed>(
      input.fieldName === undefined
        ? {
            kind: "json_deserialization_failed",
            expectedType: input.expectedType,
            jsonSnippet,
            reason: input.reason,
          }
        : {
            kind: "json_deserialization_failed",
            fieldName: input.fieldName,
            expectedType: input.expectedType,
            jsonSnippet,
            reason: input.reason,
          },
    );
  },
  missingField: (fields: {
    fieldName: string;
    parentType: string;
  }): MissingField =>
    sealFailure<MissingField>({
      kind: "missing_field",
      fieldName: fields.fieldName,
      parentType: fields.parentType,
    }),
  invalidFieldFormat: (
    input: InvalidFieldFormatInput,
    options: SnippetOptions = {},
  ): InvalidFieldFormat =>
    sealFailure<InvalidFieldFormat>({
      kind: "invalid_field_format",
      fieldName: input.fieldName,
      expectedFormat: input.expectedFormat,
      actual: truncateForDisplay(
        input.actual,
        options.maxLength ?? DEFAULT_SNIPPET_LENGTH,
      ),
    }),
  invalidArrayLength: (fields: {
    fieldName: string;
    expected: number;
    actual: number;
  }): InvalidArrayLength =>
    sealFailure<InvalidArrayLength>({
      kind: "invalid_array_length",
      fieldName: fields.fieldName,
      expected: fields.expected,
      actual: fields.actual,
    }),
  invalidNumber: (
    input: InvalidNumberInput,
    options: SnippetOptions = {},
  ): InvalidNumber =>
    sealFailure<InvalidNumber>({
      kind: "invalid_number",
      fieldName: input.fieldName,
      rawValue: truncateForDisplay(
        input.rawValue,
        options.maxLength ?? DEFAULT_SNIPPET_LENGTH,
      ),
      reason: input.reason,
    }),
};

export const describeParseFailure = (failure: ParseFailure): string => {
  switch (failure.kind) {
    case "json_deserialization_failed": {
      const field =
        failure.fieldName === undefined
          ? ""
          : ` for field '${failure.fieldName}'`;
      return `Failed to deserialize JSON${field}: Expected type '${failure.expectedType}'\nReason: ${failure.reason}\nJSON: ${failure.jsonSnippet}`;
    }
    case "missing_field":
      return `Required field '${failure.fieldName}' is missing from ${failure.parentType}`;
    case "invalid_field_format":
      return `Field '${failure.fieldName}' has invalid format. Expected: ${failure.expectedFormat}, Got: ${failure.actual}`;
    case "invalid_array_length":
      return `Array '${failure.fieldName}' has invalid length. Expected: ${failure.expected}, Got: ${failure.actual}`;
    case "invalid_number":
      return `Field '${failure.fieldName}' has invalid number '${failure.rawValue}': ${failure.reason}`;
  }
};
