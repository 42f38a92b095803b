/**
 * Canonical market shapes every data source is standardized into.
 * Quotes and window volumes the source did not report stay `undefined`.
 */
export type Market = {
  question: string;
  conditionId: string;
  slug: string;
  outcomes: string[];
  outcomePrices: number[];
  yesTokenId: string;
  noTokenId: string;
  yesPrice: number;
  noPrice: number;
  active: boolean;
  closed: boolean;
  volume: number;
  volume24h?: number;
  volume1w?: number;
  volume1m?: number;
  volume1y?: number;
  liquidity: number;
  competitive?: number;
  lastTradePrice?: number;
  bidPrice?: number;
  askPrice?: number;
  updatedAt?: Date;
};

export type MarketGroup = {
  slug: string;
  title: string;
  active: boolean;
  closed: boolean;
  volume: number;
  liquidity: number;
  updatedAt?: Date;
  markets: Market[];
};

export type PositionSide = "YES" | "NO";

export type Position = {
  positionId: string;
  traderAddress: string;
  tokenId: string;
  side: PositionSide;
  sharesHeld: number;
  avgEntryPrice: number;
};
