import { err, ok, Result } from "neverthrow";
import type {
  MarketGroupSummary,
  MarketSummary,
  PositionValuation,
} from "../../core/entities/analysis";
import type { Market, MarketGroup, Position } from "../../core/entities/market";
import {
  analysisFailures,
  type AnalysisFailure,
} from "../../core/failures/analysisFailure";
import type { ClockPort } from "../../core/ports/outboundPorts";

const GROUP_SUMMARY = "group summary";
const VOLUME_WEIGHTING = "volume-weighted probability";
const POSITION_VALUATION = "position valuation";

const summarizeMarket = (
  market: Market,
): Result<MarketSummary, AnalysisFailure> => {
  const spread =
    market.askPrice !== undefined && market.bidPrice !== undefined
      ? market.askPrice - market.bidPrice
      : undefined;
  if (
    (spread !== undefined && !Number.isFinite(spread)) ||
    !Number.isFinite(market.yesPrice)
  ) {
    return err(
      analysisFailures.calculationFailed({
        analysisType: GROUP_SUMMARY,
        reason: `market '${market.slug}' produced a non-finite spread or price`,
      }),
    );
  }

  return ok({
    slug: market.slug,
    question: market.question,
    yesPrice: market.yesPrice,
    noPrice: market.noPrice,
    spread,
    volume: market.volume,
    volume24h: market.volume24h,
    liquidity: market.liquidity,
    active: market.active,
    closed: market.closed,
  });
};

/**
 * Derives group- and position-level figures from standardized markets.
 * Every anomaly surfaces as an analysis failure; nothing is defaulted away.
 */
export class MarketAnalysisService {
  constructor(
    private readonly clock: ClockPort,
    private readonly maxAgeSecs: number,
  ) {}

  summarizeGroup(
    group: MarketGroup,
  ): Result<MarketGroupSummary, AnalysisFailure> {
    if (group.markets.length === 0) {
      return err(
        analysisFailures.insufficientData({
          analysisType: GROUP_SUMMARY,
          reason: `market group '${group.slug}' has no markets`,
        }),
      );
    }

    if (group.updatedAt) {
      const ageSecs = Math.floor(
        (this.clock.now().getTime() - group.updatedAt.getTime()) / 1_000,
      );
      if (ageSecs > this.maxAgeSecs) {
        return err(
          analysisFailures.staleData({
            analysisType: GROUP_SUMMARY,
            ageSecs,
            maxAgeSecs: this.maxAgeSecs,
          }),
        );
      }
    }

    const totalVolume = group.markets.reduce(
      (sum, market) => sum + market.volume,
      0,
    );
    if (totalVolume <= 0) {
      return err(
        analysisFailures.statisticalError({
          analysisType: VOLUME_WEIGHTING,
          reason: `total volume across ${group.markets.length} markets is zero`,
        }),
      );
    }

    return Result.combine(group.markets.map(summarizeMarket)).andThen(
      (markets) => {
        const weighted =
          group.markets.reduce(
            (sum, market) => sum + market.yesPrice * market.volume,
            0,
          ) / totalVolume;

        if (!Number.isFinite(weighted)) {
          return err(
            analysisFailures.calculationFailed({
              analysisType: VOLUME_WEIGHTING,
              reason: "weighted price is not finite",
            }),
          );
        }

        return ok({
          groupSlug: group.slug,
          title: group.title,
          marketCount: group.markets.length,
          activeMarketCount: group.markets.filter(
            (market) => market.active && !market.closed,
          ).length,
          totalVolume,
          totalLiquidity: group.markets.reduce(
            (sum, market) => sum + market.liquidity,
            0,
          ),
          volumeWeightedYesPrice: weighted,
          markets,
        });
      },
    );
  }

  summarizeMarket(market: Market): Result<MarketSummary, AnalysisFailure> {
    return summarizeMarket(market);
  }

  /**
   * Marks positions to the market's current outcome prices.
   */
  valuePositions(
    positions: Position[],
    market: Market,
  ): Result<PositionValuation[], AnalysisFailure> {
    return Result.combine(
      positions.map((position) => this.valuePosition(position, market)),
    );
  }

  private valuePosition(
    position: Position,
    market: Market,
  ): Result<PositionValuation, AnalysisFailure> {
    const invalid = (reason: string) =>
      err(
        analysisFailures.invalidPosition({
          positionId: position.positionId,
          reason,
        }),
      );

    const tokenSide =
      position.tokenId === market.yesTokenId
        ? "YES"
        : position.tokenId === market.noTokenId
          ? "NO"
          : null;

    if (tokenSide === null) {
      return invalid(
        `token '${position.tokenId}' does not belong to market '${market.slug}'`,
      );
    }
    if (tokenSide !== position.side) {
      return invalid(
        `side ${position.side} does not match token side ${tokenSide}`,
      );
    }
    if (!Number.isFinite(position.sharesHeld) || position.sharesHeld < 0) {
      return invalid(`shares held ${position.sharesHeld} is not a non-negative amount`);
    }
    if (
      !Number.isFinite(position.avgEntryPrice) ||
      position.avgEntryPrice < 0 ||
      position.avgEntryPrice > 1
    ) {
      return invalid(`average entry price ${position.avgEntryPrice} is outside [0, 1]`);
    }

    const markPrice = tokenSide === "YES" ? market.yesPrice : market.noPrice;
    const costBasis = position.sharesHeld * position.avgEntryPrice;
    const marketValue = position.sharesHeld * markPrice;

    return ok({
      positionId: position.positionId,
      traderAddress: position.traderAddress,
      side: tokenSide,
      sharesHeld: position.sharesHeld,
      avgEntryPrice: position.avgEntryPrice,
      markPrice,
      costBasis,
      marketValue,
      unrealizedPnl: marketValue - costBasis,
    });
  }
}
