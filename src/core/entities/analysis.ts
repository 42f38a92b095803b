import type { MarketGroup, PositionSide } from "./market";

export type MarketSummary = {
  slug: string;
  question: string;
  yesPrice: number;
  noPrice: number;
  // Absent unless both sides of the book are quoted.
  spread?: number;
  volume: number;
  volume24h?: number;
  liquidity: number;
  active: boolean;
  closed: boolean;
};

export type MarketGroupSummary = {
  groupSlug: string;
  title: string;
  marketCount: number;
  activeMarketCount: number;
  totalVolume: number;
  totalLiquidity: number;
  volumeWeightedYesPrice: number;
  markets: MarketSummary[];
};

export type PositionValuation = {
  positionId: string;
  traderAddress: string;
  side: PositionSide;
  sharesHeld: number;
  avgEntryPrice: number;
  markPrice: number;
  costBasis: number;
  marketValue: number;
  unrealizedPnl: number;
};

/**
 * Everything the present stage renders for one explore request.
 */
export type MarketReport = {
  group: MarketGroup;
  summary: MarketGroupSummary;
  focus?: MarketSummary;
  positions: PositionValuation[];
};
