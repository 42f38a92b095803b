import { describe, expect, it } from "vitest";
import { market, marketGroup } from "../../__tests__/fixtures/gammaFixtures";
import type { Position } from "../../core/entities/market";
import { MarketAnalysisService } from "./marketAnalysisService";

const MAX_AGE_SECS = 86_400;

const serviceAt = (iso: string) =>
  new MarketAnalysisService({ now: () => new Date(iso) }, MAX_AGE_SECS);

const secondMarket = () =>
  market({
    slug: "index-above-120",
    yesTokenId: "token-yes-2",
    noTokenId: "token-no-2",
    yesPrice: 0.25,
    noPrice: 0.75,
    volume: 500,
    liquidity: 200,
    bidPrice: 0.24,
    askPrice: 0.27,
  });

const position = (overrides: Partial<Position> = {}): Position => ({
  positionId: "pos-1",
  traderAddress: "0xtrader",
  tokenId: "token-yes-1",
  side: "YES",
  sharesHeld: 100,
  avgEntryPrice: 0.5,
  ...overrides,
});

describe("MarketAnalysisService.summarizeGroup", () => {
  const service = serviceAt("2026-01-10T01:00:00.000Z");

  it("weights the yes price by market volume", () => {
    const result = service.summarizeGroup(
      marketGroup({ markets: [market(), secondMarket()] }),
    );

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value.volumeWeightedYesPrice).toBeCloseTo(0.5275, 10);
    expect(result.value.totalVolume).toBe(2000);
    expect(result.value.totalLiquidity).toBe(500);
    expect(result.value.marketCount).toBe(2);
    expect(result.value.markets[1]?.spread).toBeCloseTo(0.03, 10);
  });

  it("counts only open markets as active", () => {
    const result = service.summarizeGroup(
      marketGroup({ markets: [market(), market({ slug: "done", closed: true })] }),
    );

    expect(result.isOk() && result.value.activeMarketCount).toBe(1);
  });

  it("needs at least one market", () => {
    const result = service.summarizeGroup(marketGroup({ markets: [] }));

    expect(result.isErr() && result.error).toEqual({
      kind: "insufficient_data",
      analysisType: "group summary",
      reason: "market group 'test-index-event' has no markets",
    });
  });

  it("rejects data older than the maximum age", () => {
    const result = serviceAt("2026-01-11T00:00:01.000Z").summarizeGroup(marketGroup());

    expect(result.isErr() && result.error).toEqual({
      kind: "stale_data",
      analysisType: "group summary",
      ageSecs: 86_401,
      maxAgeSecs: 86_400,
    });
  });

  it("skips the age check when the source gave no timestamp", () => {
    const result = serviceAt("2030-01-01T00:00:00.000Z").summarizeGroup(
      marketGroup({ updatedAt: undefined }),
    );

    expect(result.isOk()).toBe(true);
  });

  it("cannot weight a group with no volume", () => {
    const result = service.summarizeGroup(
      marketGroup({ markets: [market({ volume: 0 })] }),
    );

    expect(result.isErr() && result.error).toEqual({
      kind: "statistical_error",
      analysisType: "volume-weighted probability",
      reason: "total volume across 1 markets is zero",
    });
  });

  it("leaves the spread out when a side of the book is missing", () => {
    const result = service.summarizeMarket(market({ askPrice: undefined }));

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value.spread).toBeUndefined();
    expect(result.value.yesPrice).toBe(0.62);
  });

  it("reports a spread that cannot be computed", () => {
    const result = service.summarizeGroup(
      marketGroup({ markets: [market({ askPrice: Number.NaN })] }),
    );

    expect(result.isErr() && result.error).toEqual({
      kind: "calculation_failed",
      analysisType: "group summary",
      reason: "market 'index-above-100' produced a non-finite spread or price",
    });
  });
});

describe("MarketAnalysisService.valuePositions", () => {
  const service = serviceAt("2026-01-10T01:00:00.000Z");

  it("marks positions to the current outcome price", () => {
    const result = service.valuePositions(
      [position(), position({ positionId: "pos-2", tokenId: "token-no-1", side: "NO" })],
      market(),
    );

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    const [yes, no] = result.value;
    expect(yes?.markPrice).toBe(0.62);
    expect(yes?.costBasis).toBe(50);
    expect(yes?.marketValue).toBeCloseTo(62, 10);
    expect(yes?.unrealizedPnl).toBeCloseTo(12, 10);
    expect(no?.markPrice).toBe(0.38);
    expect(no?.unrealizedPnl).toBeCloseTo(-12, 10);
  });

  it("rejects a token from another market", () => {
    const result = service.valuePositions([position({ tokenId: "token-x" })], market());

    expect(result.isErr() && result.error).toEqual({
      kind: "invalid_position",
      positionId: "pos-1",
      reason: "token 'token-x' does not belong to market 'index-above-100'",
    });
  });

  it("rejects a side that disagrees with the token", () => {
    const result = service.valuePositions(
      [position({ tokenId: "token-no-1", side: "YES" })],
      market(),
    );

    expect(result.isErr() && result.error).toEqual({
      kind: "invalid_position",
      positionId: "pos-1",
      reason: "side YES does not match token side NO",
    });
  });

  it("rejects negative holdings and impossible entry prices", () => {
    const negative = service.valuePositions([position({ sharesHeld: -1 })], market());
    const overpriced = service.valuePositions(
      [position({ avgEntryPrice: 1.5 })],
      market(),
    );

    expect(negative.isErr() && negative.error.kind === "invalid_position" && negative.error.reason).toBe(
      "shares held -1 is not a non-negative amount",
    );
    expect(
      overpriced.isErr() && overpriced.error.kind === "invalid_position" && overpriced.error.reason,
    ).toBe("average entry price 1.5 is outside [0, 1]");
  });
});
