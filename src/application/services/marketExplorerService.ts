import { err, ok, type Result } from "neverthrow";
import type { MarketReport, MarketSummary } from "../../core/entities/analysis";
import type { MarketGroup } from "../../core/entities/market";
import {
  promote,
  promoteAnalysis,
  promoteNormalization,
  promoteParse,
  promoteSource,
  type PipelineFailure,
} from "../../core/failures/pipelineFailure";
import { sourceFailures } from "../../core/failures/sourceFailure";
import type {
  ExploreRequest,
  MarketGroupSourcePort,
} from "../../core/ports/inboundPorts";
import { parseMarketGroupPayload } from "../../infra/providers/gamma/gammaPayloadParser";
import { standardizeMarketGroup } from "../../infra/providers/gamma/gammaStandardizer";
import { logger } from "../../shared/logger/logger";
import type { MarketAnalysisService } from "./marketAnalysisService";

export type MarketExplorerOptions = {
  snippetMaxLength?: number;
};

/**
 * Runs fetch → parse → normalize → analyze for one market group.
 * Each stage's failure is promoted as it crosses the stage boundary, so callers only ever see PipelineFailure.
 */
export class MarketExplorerService {
  constructor(
    private readonly source: MarketGroupSourcePort,
    private readonly analysis: MarketAnalysisService,
    private readonly options: MarketExplorerOptions = {},
  ) {}

  async explore(
    request: ExploreRequest,
  ): Promise<Result<MarketReport, PipelineFailure>> {
    const { groupSlug } = request;
    logger.debug({ groupSlug }, "Fetching market group");

    const fetched = (await this.source.fetchMarketGroup(groupSlug)).mapErr(
      promote,
    );

    const report = fetched
      .andThen((text) => {
        logger.debug({ groupSlug, bytes: text.length }, "Parsing market group");
        return parseMarketGroupPayload(text, {
          snippetMaxLength: this.options.snippetMaxLength,
        }).mapErr(promoteParse);
      })
      .andThen((payload) => {
        logger.debug(
          { groupSlug, markets: payload.markets.length },
          "Normalizing market group",
        );
        return standardizeMarketGroup(payload).mapErr(promoteNormalization);
      })
      .andThen((group) => {
        logger.debug({ groupSlug: group.slug }, "Analyzing market group");
        return this.analyze(group, request);
      });

    if (report.isErr()) {
      logger.debug(
        { stage: report.error.stage, kind: report.error.failure.kind },
        "Market exploration failed",
      );
    }

    return report;
  }

  private analyze(
    group: MarketGroup,
    request: ExploreRequest,
  ): Result<MarketReport, PipelineFailure> {
    const summary = this.analysis.summarizeGroup(group).mapErr(promoteAnalysis);
    if (summary.isErr()) {
      return err(summary.error);
    }
    const groupSummary = summary.value;

    if (request.marketSlug === undefined) {
      return ok({ group, summary: groupSummary, positions: [] });
    }

    const market = group.markets.find(
      (candidate) => candidate.slug === request.marketSlug,
    );
    if (!market) {
      return err(
        promoteSource(
          sourceFailures.marketNotFound({
            groupSlug: group.slug,
            marketSlug: request.marketSlug,
          }),
        ),
      );
    }

    const focus: Result<MarketSummary, PipelineFailure> = this.analysis
      .summarizeMarket(market)
      .mapErr(promoteAnalysis);

    return focus.andThen((focusSummary) =>
      this.analysis
        .valuePositions(request.positions ?? [], market)
        .mapErr(promoteAnalysis)
        .map((positions) => ({
          group,
          summary: groupSummary,
          focus: focusSummary,
          positions,
        })),
    );
  }
}
