import { sealFailure, type FailureFields } from "./failureValue";

export const analysisFailureKinds = [
  "insufficient_data",
  "calculation_failed",
  "invalid_position",
  "statistical_error",
  "stale_data",
] as const;

export type AnalysisFailureKind = (typeof analysisFailureKinds)[number];

export type InsufficientData = {
  readonly kind: "insufficient_data";
  readonly analysisType: string;
  readonly reason: string;
};

export type CalculationFailed = {
  readonly kind: "calculation_failed";
  readonly analysisType: string;
  readonly reason: string;
};

export type InvalidPosition = {
  readonly kind: "invalid_position";
  readonly positionId: string;
  readonly reason: string;
};

export type StatisticalError = {
  readonly kind: "statistical_error";
  readonly analysisType: string;
  readonly reason: string;
};

/**
 * Carries both the observed age and the configured bound.
 */
export type StaleData = {
  readonly kind: "stale_data";
  readonly analysisType: string;
  readonly ageSecs: number;
  readonly maxAgeSecs: number;
};

export type AnalysisFailure =
  | InsufficientData
  | CalculationFailed
  | InvalidPosition
  | StatisticalError
  | StaleData;

const analysisKindSet: ReadonlySet<string> = new Set(analysisFailureKinds);

export const isAnalysisFailure = (value: {
  readonly kind: string;
}): value is AnalysisFailure => analysisKindSet.has(value.kind);

export const analysisFailures = {
  insufficientData: (
    fields: FailureFields<InsufficientData>,
  ): InsufficientData =>
    sealFailure<InsufficientData>({
      kind: "insufficient_data",
      analysisType: fields.analysisType,
      reason: fields.reason,
    }),
  calculationFailed: (
    fields: FailureFields<CalculationFailed>,
  ): CalculationFailed =>
    sealFailure<CalculationFailed>({
      kind: "calculation_failed",
      analysisType: fields.analysisType,
      reason: fields.reason,
    }),
  invalidPosition: (fields: FailureFields<InvalidPosition>): InvalidPosition =>
    sealFailure<InvalidPosition>({
      kind: "invalid_position",
      positionId: fields.positionId,
      reason: fields.reason,
    }),
  statisticalError: (
    fields: FailureFields<StatisticalError>,
  ): StatisticalError =>
    sealFailure<StatisticalError>({
      kind: "statistical_error",
      analysisType: fields.analysisType,
      reason: fields.reason,
    }),
  staleData: (fields: FailureFields<StaleData>): StaleData =>
    sealFailure<StaleData>({
      kind: "stale_data",
      analysisType: fields.analysisType,
      ageSecs: fields.ageSecs,
      maxAgeSecs: fields.maxAgeSecs,
    }),
};

export const describeAnalysisFailure = (failure: AnalysisFailure): string => {
  switch (failure.kind) {
    case "insufficient_data":
      return `Insufficient data for ${failure.analysisType} analysis: ${failure.reason}`;
    case "calculation_failed":
      return `${failure.analysisType} calculation failed: ${failure.reason}`;
    case "invalid_position":
      return `Invalid position '${failure.positionId}': ${failure.reason}`;
    case "statistical_error":
      return `Statistical error in ${failure.analysisType} analysis: ${failure.reason}`;
    case "stale_data":
      return `Data for ${failure.analysisType} analysis is stale: ${failure.ageSecs} seconds old (maximum ${failure.maxAgeSecs} seconds)`;
  }
};
