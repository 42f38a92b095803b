import { Command } from "commander";
import type { Result } from "neverthrow";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { MarketExplorerService } from "../application/services/marketExplorerService";
import {
  promotePresentation,
  type PipelineFailure,
} from "../core/failures/pipelineFailure";
import type { OutputSinkPort } from "../core/ports/outboundPorts";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { exitWithFailure } from "./failurePresenter";
import { formatMarketReport, stdoutSink, writeOutput } from "./reportFormatter";

export type AnalyzeOptions = {
  group: string;
  market?: string;
};

/**
 * Runs the whole pipeline for one group and prints the report; present-stage failures are promoted like any other.
 */
export const runAnalyze = async (
  explorer: MarketExplorerService,
  opts: AnalyzeOptions,
  sink: OutputSinkPort = stdoutSink,
): Promise<Result<void, PipelineFailure>> => {
  const report = await explorer.explore({
    groupSlug: opts.group,
    marketSlug: opts.market,
  });

  return report.andThen((value) =>
    formatMarketReport(value)
      .andThen((text) => writeOutput(text, sink))
      .mapErr(promotePresentation),
  );
};

/**
 * Defines a single command surface so every run goes through the same failure presentation.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("market-explorer")
    .description("Explore prediction-market groups from the Gamma API");

  cli
    .command("analyze")
    .description("Fetch, normalize and analyze one market group")
    .requiredOption("-g, --group <slug>", "Market group (event) slug")
    .option("-m, --market <slug>", "Focus on one market within the group")
    .action(async (opts: AnalyzeOptions) => {
      const runtime = createRuntime();
      const outcome = await runAnalyze(runtime.explorerService, opts);

      if (outcome.isErr()) {
        logger.warn(
          {
            stage: outcome.error.stage,
            kind: outcome.error.failure.kind,
            group: opts.group,
          },
          "Analyze failed",
        );
        exitWithFailure(outcome.error);
      }
    });

  cli
    .command("config")
    .description("Report resolved configuration")
    .action(() => {
      logger.info(
        {
          gammaBaseUrl: env.GAMMA_BASE_URL,
          timeoutMs: env.GAMMA_TIMEOUT_MS,
          retries: env.GAMMA_RETRIES,
          retryDelayMs: env.GAMMA_RETRY_DELAY_MS,
          maxAgeSeconds: env.MARKET_MAX_AGE_SECONDS,
          snippetMaxLength: env.SNIPPET_MAX_LENGTH,
        },
        "Runtime configuration",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
