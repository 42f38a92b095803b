import { afterEach, describe, expect, it, vi } from "vitest";
import { allSampleFailures } from "../__tests__/fixtures/failureFixtures";
import {
  pipelineStages,
  promote,
  promoteSource,
  promoteTransport,
} from "../core/failures/pipelineFailure";
import { sourceFailures } from "../core/failures/sourceFailure";
import { transportFailures } from "../core/failures/transportFailure";
import {
  exitWithFailure,
  FAILURE_EXIT_CODE,
  FAILURE_TIPS,
  presentFailure,
  renderPipelineFailure,
  tipFor,
  type FailureSink,
} from "./failurePresenter";

const collectingSink = (): FailureSink & { chunks: string[] } => {
  const chunks: string[] = [];
  return {
    chunks,
    write: (text) => {
      chunks.push(text);
    },
  };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("failure presentation", () => {
  it("writes the stage-labelled message followed by the stage tip", () => {
    const sink = collectingSink();
    const failure = promoteSource(
      sourceFailures.marketGroupNotFound({ slug: "non-existent-market" }),
    );

    const code = presentFailure(failure, sink);

    expect(code).toBe(FAILURE_EXIT_CODE);
    expect(sink.chunks).toEqual([
      "Data Source Error: Market group 'non-existent-market' not found\n",
      "Tip: Verify the identifier exists at the remote source.\n",
    ]);
  });

  it("labels transport failures as HTTP errors", () => {
    const failure = promoteTransport(
      transportFailures.timeout({
        url: "https://gamma.test/events/slug/test-index-event",
        durationSecs: 30,
      }),
    );

    expect(renderPipelineFailure(failure)).toBe(
      "HTTP Error: Request to https://gamma.test/events/slug/test-index-event timed out after 30 seconds",
    );
    expect(tipFor(failure.stage)).toBe("Check connectivity and URL correctness.");
  });

  it("words each tip as the documented remediation", () => {
    const phrases = Object.fromEntries(
      pipelineStages.map((stage) => [stage, tipFor(stage).toLowerCase()]),
    );

    expect(phrases).toEqual({
      http: "check connectivity and url correctness.",
      data_source: "verify the identifier exists at the remote source.",
      parse: "the remote response shape may have changed.",
      normalization: "source data failed a consistency check.",
      analysis: "insufficient or stale data for the requested analysis.",
      output: "local output/formatting environment issue.",
    });
  });

  it("has a distinct tip for every stage", () => {
    const tips = pipelineStages.map(tipFor);

    expect(new Set(tips).size).toBe(pipelineStages.length);
    expect(Object.isFrozen(FAILURE_TIPS)).toBe(true);
  });

  it("picks the tip from the stage alone", () => {
    for (const failure of allSampleFailures()) {
      const sink = collectingSink();
      const promoted = promote(failure);

      presentFailure(promoted, sink);

      expect(sink.chunks[1]).toBe(`Tip: ${FAILURE_TIPS[promoted.stage]}\n`);
    }
  });

  it("exits once with the failure code after presenting", () => {
    const sink = collectingSink();
    const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() =>
      exitWithFailure(
        promoteSource(sourceFailures.rateLimitExceeded({ retryAfterSecs: 5 })),
        sink,
      ),
    ).toThrow("exit 1");
    expect(exit).toHaveBeenCalledTimes(1);
    expect(sink.chunks[0]).toBe(
      "Data Source Error: API rate limit exceeded. Retry after 5 seconds\n",
    );
  });
});
