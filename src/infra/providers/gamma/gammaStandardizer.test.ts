import { describe, expect, it } from "vitest";
import {
  FIXTURE_UPDATED_AT,
  groupPayload,
  marketPayload,
} from "../../../__tests__/fixtures/gammaFixtures";
import { standardizeMarket, standardizeMarketGroup } from "./gammaStandardizer";

const GROUP = "test-index-event";

const failureOf = (result: ReturnType<typeof standardizeMarket>) => {
  if (result.isOk()) {
    throw new Error("expected a normalization failure");
  }
  return result.error;
};

describe("standardizeMarket", () => {
  it("maps a well-formed market onto yes and no sides", () => {
    const result = standardizeMarket(marketPayload(), GROUP);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value).toMatchObject({
      slug: "index-above-100",
      yesTokenId: "token-yes-1",
      noTokenId: "token-no-1",
      yesPrice: 0.62,
      noPrice: 0.38,
      volume: 1500,
      bidPrice: 0.6,
      askPrice: 0.63,
    });
    expect(result.value.updatedAt).toEqual(new Date(FIXTURE_UPDATED_AT));
  });

  it("follows outcome order when the source lists No first", () => {
    const result = standardizeMarket(
      marketPayload({
        outcomes: ["No", "Yes"],
        outcomePrices: [0.38, 0.62],
        clobTokenIds: ["token-no-1", "token-yes-1"],
      }),
      GROUP,
    );

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value.yesTokenId).toBe("token-yes-1");
    expect(result.value.yesPrice).toBe(0.62);
  });

  it("scopes a market without a slug to its group", () => {
    expect(failureOf(standardizeMarket(marketPayload({ slug: " " }), GROUP))).toEqual({
      kind: "empty_required_field",
      marketSlug: GROUP,
      fieldName: "slug",
    });
  });

  it("rejects an empty question", () => {
    expect(failureOf(standardizeMarket(marketPayload({ question: "" }), GROUP))).toEqual({
      kind: "empty_required_field",
      marketSlug: "index-above-100",
      fieldName: "question",
    });
  });

  it("rejects outcomes that are not yes and no", () => {
    expect(
      failureOf(standardizeMarket(marketPayload({ outcomes: ["Up", "Down"] }), GROUP)),
    ).toEqual({
      kind: "outcome_mapping_failed",
      marketSlug: "index-above-100",
      outcomes: ["Up", "Down"],
      reason: "expected exactly one 'Yes' and one 'No' outcome",
    });
  });

  it("rejects a blank token id", () => {
    expect(
      failureOf(
        standardizeMarket(marketPayload({ clobTokenIds: ["token-yes-1", " "] }), GROUP),
      ),
    ).toEqual({
      kind: "token_id_extraction_failed",
      marketSlug: "index-above-100",
      reason: "clobTokenIds is missing the NO token",
    });
  });

  it("rejects prices outside the unit interval", () => {
    expect(failureOf(standardizeMarket(marketPayload({ bestBid: 1.2 }), GROUP))).toEqual({
      kind: "invalid_price_data",
      marketSlug: "index-above-100",
      fieldName: "bestBid",
      reason: "price 1.2 is outside [0, 1]",
    });
  });

  it("rejects a price list that does not match the outcomes", () => {
    expect(
      failureOf(standardizeMarket(marketPayload({ outcomePrices: [0.62] }), GROUP)),
    ).toEqual({
      kind: "invalid_price_data",
      marketSlug: "index-above-100",
      fieldName: "outcomePrices",
      reason: "expected 2 prices, got 1",
    });
  });

  it("rejects negative volumes", () => {
    expect(failureOf(standardizeMarket(marketPayload({ volume24hr: -5 }), GROUP))).toEqual({
      kind: "invalid_volume_data",
      marketSlug: "index-above-100",
      fieldName: "volume24hr",
      reason: "expected a non-negative amount, got -5",
    });
  });

  it("rejects a crossed book", () => {
    expect(failureOf(standardizeMarket(marketPayload({ bestBid: 0.7 }), GROUP))).toEqual({
      kind: "validation_failed",
      marketSlug: "index-above-100",
      reason: "best bid 0.7 is above best ask 0.63",
    });
  });

  it("accepts a one-sided book without checking it for a cross", () => {
    const result = standardizeMarket(marketPayload({ bestAsk: undefined }), GROUP);

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value.bidPrice).toBe(0.6);
    expect(result.value.askPrice).toBeUndefined();
  });

  it("rejects yes and no prices that do not sum to about one", () => {
    expect(
      failureOf(standardizeMarket(marketPayload({ outcomePrices: [0.9, 0.5] }), GROUP)),
    ).toMatchObject({
      kind: "validation_failed",
      marketSlug: "index-above-100",
    });
  });

  it("rejects an unreadable timestamp", () => {
    expect(
      failureOf(standardizeMarket(marketPayload({ updatedAt: "yesterday" }), GROUP)),
    ).toEqual({
      kind: "validation_failed",
      marketSlug: "index-above-100",
      reason: "updatedAt 'yesterday' is not a valid timestamp",
    });
  });
});

describe("standardizeMarketGroup", () => {
  it("standardizes every market in the group", () => {
    const result = standardizeMarketGroup(
      groupPayload({
        markets: [marketPayload(), marketPayload({ slug: "index-above-120" })],
      }),
    );

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    expect(result.value.markets.map((item) => item.slug)).toEqual([
      "index-above-100",
      "index-above-120",
    ]);
    expect(result.value.updatedAt).toEqual(new Date(FIXTURE_UPDATED_AT));
  });

  it("rejects a group without a title", () => {
    const result = standardizeMarketGroup(groupPayload({ title: "" }));

    expect(result.isErr() && result.error).toEqual({
      kind: "empty_required_field",
      marketSlug: GROUP,
      fieldName: "title",
    });
  });

  it("fails with the first failing market", () => {
    const result = standardizeMarketGroup(
      groupPayload({
        markets: [
          marketPayload(),
          marketPayload({ slug: "index-above-120", question: "" }),
          marketPayload({ slug: "index-above-140", outcomes: ["Up", "Down"] }),
        ],
      }),
    );

    expect(result.isErr() && result.error).toEqual({
      kind: "empty_required_field",
      marketSlug: "index-above-120",
      fieldName: "question",
    });
  });
});
