import { MarketAnalysisService } from "../services/marketAnalysisService";
import { MarketExplorerService } from "../services/marketExplorerService";
import { env, type AppEnv } from "../../shared/config/env";
import { GammaMarketSource } from "../../infra/providers/gamma/gammaMarketSource";
import { SystemClock } from "../../infra/system/systemPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Centralizes runtime wiring so the CLI and tests share one composition root.
 */
export const createRuntime = (
  appEnv: AppEnv = env,
  clock: ClockPort = new SystemClock(),
) => {
  const source = new GammaMarketSource(appEnv.GAMMA_BASE_URL, {
    timeoutMs: appEnv.GAMMA_TIMEOUT_MS,
    retries: appEnv.GAMMA_RETRIES,
    retryDelayMs: appEnv.GAMMA_RETRY_DELAY_MS,
    snippetMaxLength: appEnv.SNIPPET_MAX_LENGTH,
  });

  const analysisService = new MarketAnalysisService(
    clock,
    appEnv.MARKET_MAX_AGE_SECONDS,
  );
  const explorerService = new MarketExplorerService(source, analysisService, {
    snippetMaxLength: appEnv.SNIPPET_MAX_LENGTH,
  });

  return {
    source,
    analysisService,
    explorerService,
  };
};
