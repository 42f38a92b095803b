import { err, ok, Result } from "neverthrow";
import type { MarketReport, MarketSummary } from "../core/entities/analysis";
import {
  presentationFailures,
  type PresentationFailure,
} from "../core/failures/presentationFailure";
import type { OutputSinkPort } from "../core/ports/outboundPorts";

const REPORT_DATA_TYPE = "market report";

const percent = (value: number): string => `${(value * 100).toFixed(1)}%`;

const usd = (value: number): string =>
  `$${value.toLocaleString("en-US", { maximumFractionDigits: 0 })}`;

const spreadText = (spread: number | undefined): string =>
  spread === undefined ? "n/a" : spread.toFixed(3);

const section = (title: string): string[] => {
  const rule = "=".repeat(67);
  return ["", rule, title, rule];
};

/**
 * Walks the report's numbers; the first non-finite one names the field that cannot be rendered.
 */
const findNonFinite = (value: unknown, path: string): string | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? null : path;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? path : null;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    for (const [index, item] of items.entries()) {
      const found = findNonFinite(item, `${path}[${index}]`);
      if (found) {
        return found;
      }
    }
    return null;
  }

  if (value !== null && typeof value === "object") {
    for (const [key, item] of Object.entries(value)) {
      const found = findNonFinite(item, path ? `${path}.${key}` : key);
      if (found) {
        return found;
      }
    }
  }

  return null;
};

const marketLine = (market: MarketSummary): string => {
  const status = market.closed ? "closed" : market.active ? "active" : "inactive";
  return `- ${market.slug}: YES ${percent(market.yesPrice)} / NO ${percent(market.noPrice)}, spread ${spreadText(market.spread)}, volume ${usd(market.volume)} (${status})`;
};

/**
 * Formats an explore report into the terminal layout printed by the analyze command.
 */
export const formatMarketReport = (
  report: MarketReport,
): Result<string, PresentationFailure> => {
  const badField = findNonFinite(report, "");
  if (badField) {
    return err(
      presentationFailures.formattingFailed({
        dataType: REPORT_DATA_TYPE,
        reason: `field '${badField}' is not a finite value`,
      }),
    );
  }

  const { group, summary, focus, positions } = report;
  const lines: string[] = [];

  lines.push(...section("MARKET GROUP"));
  lines.push(`  Title:         ${group.title}`);
  lines.push(`  Slug:          ${group.slug}`);
  lines.push(`  Active:        ${group.active}`);
  lines.push(`  Closed:        ${group.closed}`);
  lines.push(
    `  Markets:       ${summary.marketCount} (${summary.activeMarketCount} open)`,
  );
  lines.push(`  Volume:        ${usd(summary.totalVolume)}`);
  lines.push(`  Liquidity:     ${usd(summary.totalLiquidity)}`);
  lines.push(
    `  Weighted YES:  ${percent(summary.volumeWeightedYesPrice)}`,
  );

  lines.push(...section("MARKETS"));
  summary.markets.forEach((market) => lines.push(marketLine(market)));

  if (focus) {
    const market = group.markets.find((candidate) => candidate.slug === focus.slug);
    lines.push(...section("MARKET INFORMATION"));
    lines.push(`  Question:      ${focus.question}`);
    lines.push(`  Slug:          ${focus.slug}`);
    if (market) {
      lines.push(`  Condition ID:  ${market.conditionId}`);
      lines.push(`  YES Token:     ${market.yesTokenId}`);
      lines.push(`  NO Token:      ${market.noTokenId}`);
    }
    lines.push(`  YES Price:     ${percent(focus.yesPrice)}`);
    lines.push(`  NO Price:      ${percent(focus.noPrice)}`);
    lines.push(`  Spread:        ${spreadText(focus.spread)}`);
    lines.push(
      `  24h Volume:    ${focus.volume24h === undefined ? "n/a" : usd(focus.volume24h)}`,
    );
  }

  if (positions.length > 0) {
    lines.push(...section("POSITIONS"));
    positions.forEach((position) => {
      lines.push(
        `- ${position.positionId} ${position.side} ${position.sharesHeld} @ ${position.avgEntryPrice.toFixed(3)} -> mark ${position.markPrice.toFixed(3)}, pnl ${position.unrealizedPnl.toFixed(2)}`,
      );
    });
  }

  return ok(lines.join("\n"));
};

/**
 * Hands rendered text to the sink, reporting a throwing sink as a write failure.
 */
export const writeOutput = (
  text: string,
  sink: OutputSinkPort,
): Result<void, PresentationFailure> =>
  Result.fromThrowable(
    () => sink.write(text),
    (error) =>
      presentationFailures.writeFailed({
        target: sink.target,
        reason: error instanceof Error ? error.message : String(error),
      }),
  )();

export const stdoutSink: OutputSinkPort = {
  target: "stdout",
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
};
