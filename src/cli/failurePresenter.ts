import {
  describeStageFailure,
  type PipelineFailure,
  type PipelineStage,
} from "../core/failures/pipelineFailure";

/**
 * One remediation tip per stage, chosen by the top-level stage tag alone.
 */
export const FAILURE_TIPS: Readonly<Record<PipelineStage, string>> =
  Object.freeze({
    http: "Check connectivity and URL correctness.",
    data_source: "Verify the identifier exists at the remote source.",
    parse: "The remote response shape may have changed.",
    normalization: "Source data failed a consistency check.",
    analysis: "Insufficient or stale data for the requested analysis.",
    output: "Local output/formatting environment issue.",
  });

const STAGE_LABELS: Readonly<Record<PipelineStage, string>> = Object.freeze({
  http: "HTTP",
  data_source: "Data Source",
  parse: "Parse",
  normalization: "Normalization",
  analysis: "Analysis",
  output: "Output",
});

export const FAILURE_EXIT_CODE = 1;

export type FailureSink = {
  write(text: string): void;
};

export const tipFor = (stage: PipelineStage): string => FAILURE_TIPS[stage];

export const renderPipelineFailure = (failure: PipelineFailure): string =>
  `${STAGE_LABELS[failure.stage]} Error: ${describeStageFailure(failure)}`;

/**
 * Writes the rendered failure followed by its stage tip and returns the exit code to terminate with.
 */
export const presentFailure = (
  failure: PipelineFailure,
  sink: FailureSink,
): number => {
  sink.write(`${renderPipelineFailure(failure)}\n`);
  sink.write(`Tip: ${tipFor(failure.stage)}\n`);
  return FAILURE_EXIT_CODE;
};

export const stderrSink: FailureSink = {
  write: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Terminal step for a failed run: presents once, then ends the process non-zero.
 */
export const exitWithFailure = (
  failure: PipelineFailure,
  sink: FailureSink = stderrSink,
): never => process.exit(presentFailure(failure, sink));
