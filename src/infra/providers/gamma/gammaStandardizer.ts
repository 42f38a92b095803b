import { err, ok, Result } from "neverthrow";
import type { Market, MarketGroup } from "../../../core/entities/market";
import {
  normalizationFailures,
  type NormalizationFailure,
} from "../../../core/failures/normalizationFailure";
import type {
  GammaMarketGroupPayload,
  GammaMarketPayload,
} from "./gammaPayloadParser";

// Tolerated drift between YES+NO prices and 1.0 before the pair is rejected.
const PRICE_SUM_TOLERANCE = 0.1;

const isProbability = (value: number): boolean =>
  Number.isFinite(value) && value >= 0 && value <= 1;

const toDate = (
  marketSlug: string,
  fieldName: string,
  raw: string | undefined,
): Result<Date | undefined, NormalizationFailure> => {
  if (raw === undefined) {
    return ok(undefined);
  }

  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    return err(
      normalizationFailures.validationFailed({
        marketSlug,
        reason: `${fieldName} '${raw}' is not a valid timestamp`,
      }),
    );
  }

  return ok(parsed);
};

const checkVolumes = (
  marketSlug: string,
  volumes: Record<string, number | undefined>,
): Result<void, NormalizationFailure> => {
  for (const [fieldName, value] of Object.entries(volumes)) {
    if (value === undefined) {
      continue;
    }
    if (!Number.isFinite(value) || value < 0) {
      return err(
        normalizationFailures.invalidVolumeData({
          marketSlug,
          fieldName,
          reason: `expected a non-negative amount, got ${value}`,
        }),
      );
    }
  }

  return ok(undefined);
};

const mapOutcomes = (
  raw: GammaMarketPayload,
): Result<{ yesIndex: number; noIndex: number }, NormalizationFailure> => {
  const labels = raw.outcomes.map((outcome) => outcome.trim().toLowerCase());
  const yesIndex = labels.indexOf("yes");
  const noIndex = labels.indexOf("no");

  if (labels.length !== 2 || yesIndex === -1 || noIndex === -1) {
    return err(
      normalizationFailures.outcomeMappingFailed({
        marketSlug: raw.slug,
        outcomes: raw.outcomes,
        reason: "expected exactly one 'Yes' and one 'No' outcome",
      }),
    );
  }

  return ok({ yesIndex, noIndex });
};

const checkPrices = (raw: GammaMarketPayload): Result<void, NormalizationFailure> => {
  if (raw.outcomePrices.length !== raw.outcomes.length) {
    return err(
      normalizationFailures.invalidPriceData({
        marketSlug: raw.slug,
        fieldName: "outcomePrices",
        reason: `expected ${raw.outcomes.length} prices, got ${raw.outcomePrices.length}`,
      }),
    );
  }

  const quoted: Array<[string, number | undefined]> = [
    ...raw.outcomePrices.map(
      (price, index): [string, number | undefined] => [
        `outcomePrices[${index}]`,
        price,
      ],
    ),
    ["lastTradePrice", raw.lastTradePrice],
    ["bestBid", raw.bestBid],
    ["bestAsk", raw.bestAsk],
  ];

  for (const [fieldName, price] of quoted) {
    if (price !== undefined && !isProbability(price)) {
      return err(
        normalizationFailures.invalidPriceData({
          marketSlug: raw.slug,
          fieldName,
          reason: `price ${price} is outside [0, 1]`,
        }),
      );
    }
  }

  return ok(undefined);
};

/**
 * Converts a decoded Gamma market into the canonical market, rejecting data that fails consistency checks.
 * `groupSlug` scopes failures for markets that arrive without a slug of their own.
 */
export const standardizeMarket = (
  raw: GammaMarketPayload,
  groupSlug: string,
): Result<Market, NormalizationFailure> => {
  if (!raw.slug.trim()) {
    return err(
      normalizationFailures.emptyRequiredField({
        marketSlug: groupSlug,
        fieldName: "slug",
      }),
    );
  }

  const marketSlug = raw.slug;
  if (!raw.question.trim()) {
    return err(
      normalizationFailures.emptyRequiredField({ marketSlug, fieldName: "question" }),
    );
  }
  if (!raw.conditionId.trim()) {
    return err(
      normalizationFailures.emptyRequiredField({
        marketSlug,
        fieldName: "conditionId",
      }),
    );
  }

  return mapOutcomes(raw).andThen(({ yesIndex, noIndex }) => {
    const yesTokenId = raw.clobTokenIds[yesIndex]?.trim() ?? "";
    const noTokenId = raw.clobTokenIds[noIndex]?.trim() ?? "";
    if (!yesTokenId || !noTokenId) {
      return err(
        normalizationFailures.tokenIdExtractionFailed({
          marketSlug,
          reason: `clobTokenIds is missing the ${yesTokenId ? "NO" : "YES"} token`,
        }),
      );
    }

    return Result.combine([
      checkPrices(raw),
      checkVolumes(marketSlug, {
        volumeNum: raw.volumeNum,
        volume24hr: raw.volume24hr,
        volume1wk: raw.volume1wk,
        volume1mo: raw.volume1mo,
        volume1yr: raw.volume1yr,
        liquidityNum: raw.liquidityNum,
      }),
      toDate(marketSlug, "updatedAt", raw.updatedAt),
    ]).andThen(([, , updatedAt]) => {
      const yesPrice = raw.outcomePrices[yesIndex] ?? 0;
      const noPrice = raw.outcomePrices[noIndex] ?? 0;

      if (
        raw.bestBid !== undefined &&
        raw.bestAsk !== undefined &&
        raw.bestBid > raw.bestAsk
      ) {
        return err(
          normalizationFailures.validationFailed({
            marketSlug,
            reason: `best bid ${raw.bestBid} is above best ask ${raw.bestAsk}`,
          }),
        );
      }

      if (Math.abs(yesPrice + noPrice - 1) > PRICE_SUM_TOLERANCE) {
        return err(
          normalizationFailures.validationFailed({
            marketSlug,
            reason: `YES and NO prices sum to ${yesPrice + noPrice}, expected about 1`,
          }),
        );
      }

      return ok({
        question: raw.question,
        conditionId: raw.conditionId,
        slug: marketSlug,
        outcomes: raw.outcomes,
        outcomePrices: raw.outcomePrices,
        yesTokenId,
        noTokenId,
        yesPrice,
        noPrice,
        active: raw.active,
        closed: raw.closed,
        volume: raw.volumeNum,
        volume24h: raw.volume24hr,
        volume1w: raw.volume1wk,
        volume1m: raw.volume1mo,
        volume1y: raw.volume1yr,
        liquidity: raw.liquidityNum,
        competitive: raw.competitive,
        lastTradePrice: raw.lastTradePrice,
        bidPrice: raw.bestBid,
        askPrice: raw.bestAsk,
        updatedAt,
      });
    });
  });
};

/**
 * Standardizes a whole event; the first failing market aborts the group.
 */
export const standardizeMarketGroup = (
  raw: GammaMarketGroupPayload,
): Result<MarketGroup, NormalizationFailure> => {
  if (!raw.slug.trim()) {
    return err(
      normalizationFailures.emptyRequiredField({ marketSlug: raw.slug, fieldName: "slug" }),
    );
  }
  if (!raw.title.trim()) {
    return err(
      normalizationFailures.emptyRequiredField({
        marketSlug: raw.slug,
        fieldName: "title",
      }),
    );
  }

  return Result.combine([
    checkVolumes(raw.slug, { volume: raw.volume, liquidity: raw.liquidity }),
    toDate(raw.slug, "updatedAt", raw.updatedAt),
  ]).andThen(([, updatedAt]) =>
    Result.combine(
      raw.markets.map((market) => standardizeMarket(market, raw.slug)),
    ).map((markets) => ({
      slug: raw.slug,
      title: raw.title,
      active: raw.active,
      closed: raw.closed,
      volume: raw.volume,
      liquidity: raw.liquidity,
      updatedAt,
      markets,
    })),
  );
};
