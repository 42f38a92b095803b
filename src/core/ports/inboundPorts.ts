import type { Result } from "neverthrow";
import type { SourceFailure } from "../failures/sourceFailure";
import type { TransportFailure } from "../failures/transportFailure";
import type { Position } from "../entities/market";

/**
 * Fetches one market group's raw payload; interpreting the text belongs to the parse stage.
 */
export interface MarketGroupSourcePort {
  fetchMarketGroup(
    slug: string,
  ): Promise<Result<string, TransportFailure | SourceFailure>>;
}

export type ExploreRequest = {
  groupSlug: string;
  marketSlug?: string;
  positions?: Position[];
};
