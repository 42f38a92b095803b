import {
  describeAnalysisFailure,
  isAnalysisFailure,
  type AnalysisFailure,
} from "./analysisFailure";
import {
  describeNormalizationFailure,
  isNormalizationFailure,
  type NormalizationFailure,
} from "./normalizationFailure";
import {
  describeParseFailure,
  isParseFailure,
  type ParseFailure,
} from "./parseFailure";
import {
  describePresentationFailure,
  type PresentationFailure,
} from "./presentationFailure";
import {
  describeSourceFailure,
  isSourceFailure,
  type SourceFailure,
} from "./sourceFailure";
import {
  describeTransportFailure,
  isTransportFailure,
  type TransportFailure,
} from "./transportFailure";

export const pipelineStages = [
  "http",
  "data_source",
  "parse",
  "normalization",
  "analysis",
  "output",
] as const;

export type PipelineStage = (typeof pipelineStages)[number];

export type StageFailure =
  | TransportFailure
  | SourceFailure
  | ParseFailure
  | NormalizationFailure
  | AnalysisFailure
  | PresentationFailure;

export type HttpPipelineFailure = {
  readonly stage: "http";
  readonly failure: TransportFailure;
};

export type DataSourcePipelineFailure = {
  readonly stage: "data_source";
  readonly failure: SourceFailure;
};

export type ParsePipelineFailure = {
  readonly stage: "parse";
  readonly failure: ParseFailure;
};

export type NormalizationPipelineFailure = {
  readonly stage: "normalization";
  readonly failure: NormalizationFailure;
};

export type AnalysisPipelineFailure = {
  readonly stage: "analysis";
  readonly failure: AnalysisFailure;
};

export type OutputPipelineFailure = {
  readonly stage: "output";
  readonly failure: PresentationFailure;
};

/**
 * Top-level failure: exactly one stage failure, tagged by the stage that produced it.
 * The tag alone determines which stage failure type is stored.
 */
export type PipelineFailure =
  | HttpPipelineFailure
  | DataSourcePipelineFailure
  | ParsePipelineFailure
  | NormalizationPipelineFailure
  | AnalysisPipelineFailure
  | OutputPipelineFailure;

// Promotion wraps the stage failure by reference; the inner value is never copied.

export const promoteTransport = (
  failure: TransportFailure,
): HttpPipelineFailure => Object.freeze({ stage: "http", failure });

export const promoteSource = (
  failure: SourceFailure,
): DataSourcePipelineFailure =>
  Object.freeze({ stage: "data_source", failure });

export const promoteParse = (failure: ParseFailure): ParsePipelineFailure =>
  Object.freeze({ stage: "parse", failure });

export const promoteNormalization = (
  failure: NormalizationFailure,
): NormalizationPipelineFailure =>
  Object.freeze({ stage: "normalization", failure });

export const promoteAnalysis = (
  failure: AnalysisFailure,
): AnalysisPipelineFailure => Object.freeze({ stage: "analysis", failure });

export const promotePresentation = (
  failure: PresentationFailure,
): OutputPipelineFailure => Object.freeze({ stage: "output", failure });

/**
 * Routes any stage failure to its wrapper by `kind`; kind sets are disjoint across stages.
 */
export const promote = (failure: StageFailure): PipelineFailure => {
  if (isTransportFailure(failure)) {
    return promoteTransport(failure);
  }
  if (isSourceFailure(failure)) {
    return promoteSource(failure);
  }
  if (isParseFailure(failure)) {
    return promoteParse(failure);
  }
  if (isNormalizationFailure(failure)) {
    return promoteNormalization(failure);
  }
  if (isAnalysisFailure(failure)) {
    return promoteAnalysis(failure);
  }

  return promotePresentation(failure);
};

export type PipelineFailureHandlers<T> = {
  http: (failure: TransportFailure) => T;
  data_source: (failure: SourceFailure) => T;
  parse: (failure: ParseFailure) => T;
  normalization: (failure: NormalizationFailure) => T;
  analysis: (failure: AnalysisFailure) => T;
  output: (failure: PresentationFailure) => T;
};

/**
 * Exhaustive match over the stage tag, handing each handler the precisely typed stage failure.
 */
export const matchPipelineFailure = <T>(
  pipelineFailure: PipelineFailure,
  handlers: PipelineFailureHandlers<T>,
): T => {
  switch (pipelineFailure.stage) {
    case "http":
      return handlers.http(pipelineFailure.failure);
    case "data_source":
      return handlers.data_source(pipelineFailure.failure);
    case "parse":
      return handlers.parse(pipelineFailure.failure);
    case "normalization":
      return handlers.normalization(pipelineFailure.failure);
    case "analysis":
      return handlers.analysis(pipelineFailure.failure);
    case "output":
      return handlers.output(pipelineFailure.failure);
  }
};

export const unwrapStageFailure = (
  pipelineFailure: PipelineFailure,
): StageFailure => pipelineFailure.failure;

export const describeStageFailure = (pipelineFailure: PipelineFailure): string =>
  matchPipelineFailure(pipelineFailure, {
    http: describeTransportFailure,
    data_source: describeSourceFailure,
    parse: describeParseFailure,
    normalization: describeNormalizationFailure,
    analysis: describeAnalysisFailure,
    output: describePresentationFailure,
  });
