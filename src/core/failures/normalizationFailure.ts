import { sealFailure, type FailureFields } from "./failureValue";

export const normalizationFailureKinds = [
  "token_id_extraction_failed",
  "outcome_mapping_failed",
  "invalid_price_data",
  "invalid_volume_data",
  "validation_failed",
  "empty_required_field",
] as const;

export type NormalizationFailureKind =
  (typeof normalizationFailureKinds)[number];

// Normalization is always scoped to one market, so every variant carries its slug.

export type TokenIdExtractionFailed = {
  readonly kind: "token_id_extraction_failed";
  readonly marketSlug: string;
  readonly reason: string;
};

export type OutcomeMappingFailed = {
  readonly kind: "outcome_mapping_failed";
  readonly marketSlug: string;
  readonly outcomes: readonly string[];
  readonly reason: string;
};

export type InvalidPriceData = {
  readonly kind: "invalid_price_data";
  readonly marketSlug: string;
  readonly fieldName: string;
  readonly reason: string;
};

export type InvalidVolumeData = {
  readonly kind: "invalid_volume_data";
  readonly marketSlug: string;
  readonly fieldName: string;
  readonly reason: string;
};

export type ValidationFailed = {
  readonly kind: "validation_failed";
  readonly marketSlug: string;
  readonly reason: string;
};

export type EmptyRequiredField = {
  readonly kind: "empty_required_field";
  readonly marketSlug: string;
  readonly fieldName: string;
};

export type NormalizationFailure =
  | TokenIdExtractionFailed
  | OutcomeMappingFailed
  | InvalidPriceData
  | InvalidVolumeData
  | ValidationFailed
  | EmptyRequiredField;

const normalizationKindSet: ReadonlySet<string> = new Set(
  normalizationFailureKinds,
);

export const isNormalizationFailure = (value: {
  readonly kind: string;
}): value is NormalizationFailure => normalizationKindSet.has(value.kind);

export const normalizationFailures = {
  tokenIdExtractionFailed: (
    fields: FailureFields<TokenIdExtractionFailed>,
  ): TokenIdExtractionFailed =>
    sealFailure<TokenIdExtractionFailed>({
      kind: "token_id_extraction_failed",
      marketSlug: fields.marketSlug,
      reason: fields.reason,
    }),
  outcomeMappingFailed: (
    fields: FailureFields<OutcomeMappingFailed>,
  ): OutcomeMappingFailed =>
    sealFailure<OutcomeMappingFailed>({
      kind: "outcome_mapping_failed",
      marketSlug: fields.marketSlug,
      outcomes: Object.freeze([...fields.outcomes]),
      reason: fields.reason,
    }),
  invalidPriceData: (
    fields: FailureFields<InvalidPriceData>,
  ): InvalidPriceData =>
    sealFailure<InvalidPriceData>({
      kind: "invalid_price_data",
      marketSlug: fields.marketSlug,
      fieldName: fields.fieldName,
      reason: fields.reason,
    }),
  invalidVolumeData: (
    fields: FailureFields<InvalidVolumeData>,
  ): InvalidVolumeData =>
    sealFailure<InvalidVolumeData>({
      kind: "invalid_volume_data",
      marketSlug: fields.marketSlug,
      fieldName: fields.fieldName,
      reason: fields.reason,
    }),
  validationFailed: (
    fields: FailureFields<ValidationFailed>,
  ): ValidationFailed =>
    sealFailure<ValidationFailed>({
      kind: "validation_failed",
      marketSlug: fields.marketSlug,
      reason: fields.reason,
    }),
  emptyRequiredField: (
    fields: FailureFields<EmptyRequiredField>,
  ): EmptyRequiredField =>
    sealFailure<EmptyRequiredField>({
      kind: "empty_required_field",
      marketSlug: fields.marketSlug,
      fieldName: fields.fieldName,
    }),
};

export const describeNormalizationFailure = (
  failure: NormalizationFailure,
): string => {
  switch (failure.kind) {
    case "token_id_extraction_failed":
      return `Failed to extract token IDs for market '${failure.marketSlug}': ${failure.reason}`;
    case "outcome_mapping_failed":
      return `Failed to map outcomes for market '${failure.marketSlug}' (outcomes: ${JSON.stringify(failure.outcomes)}): ${failure.reason}`;
    case "invalid_price_data":
      return `Invalid price data in market '${failure.marketSlug}' for field '${failure.fieldName}': ${failure.reason}`;
    case "invalid_volume_data":
      return `Invalid volume data in market '${failure.marketSlug}' for field '${failure.fieldName}': ${failure.reason}`;
    case "validation_failed":
      return `Validation failed for market '${failure.marketSlug}': ${failure.reason}`;
    case "empty_required_field":
      return `Required field '${failure.fieldName}' is empty in market '${failure.marketSlug}'`;
  }
};
