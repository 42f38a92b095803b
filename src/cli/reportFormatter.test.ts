import { describe, expect, it } from "vitest";
import { market, marketGroup } from "../__tests__/fixtures/gammaFixtures";
import { MarketAnalysisService } from "../application/services/marketAnalysisService";
import type { MarketReport } from "../core/entities/analysis";
import type { OutputSinkPort } from "../core/ports/outboundPorts";
import { formatMarketReport, writeOutput } from "./reportFormatter";

const analysis = new MarketAnalysisService(
  { now: () => new Date("2026-01-10T01:00:00.000Z") },
  86_400,
);

const buildReport = (): MarketReport => {
  const group = marketGroup();
  const summary = analysis.summarizeGroup(group);
  const focus = analysis.summarizeMarket(market());
  if (summary.isErr() || focus.isErr()) {
    throw new Error("expected fixture analysis to succeed");
  }

  return { group, summary: summary.value, focus: focus.value, positions: [] };
};

describe("formatMarketReport", () => {
  it("renders group, market and focus sections", () => {
    const result = formatMarketReport(buildReport());

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    const lines = result.value.split("\n");
    expect(lines).toContain("MARKET GROUP");
    expect(lines).toContain("  Title:         Test index event");
    expect(lines).toContain("  Markets:       1 (1 open)");
    expect(lines).toContain("  Volume:        $1,500");
    expect(lines).toContain("  Weighted YES:  62.0%");
    expect(lines).toContain(
      "- index-above-100: YES 62.0% / NO 38.0%, spread 0.030, volume $1,500 (active)",
    );
    expect(lines).toContain("  YES Token:     token-yes-1");
    expect(lines).not.toContain("POSITIONS");
  });

  it("shows n/a for figures the source did not quote", () => {
    const base = buildReport();
    const focus = analysis.summarizeMarket(
      market({ bidPrice: undefined, volume24h: undefined }),
    );
    if (focus.isErr()) {
      throw new Error(focus.error.kind);
    }

    const result = formatMarketReport({ ...base, focus: focus.value });

    if (result.isErr()) {
      throw new Error(result.error.kind);
    }
    const lines = result.value.split("\n");
    expect(lines).toContain("  Spread:        n/a");
    expect(lines).toContain("  24h Volume:    n/a");
  });

  it("renders positions when present", () => {
    const report: MarketReport = {
      ...buildReport(),
      positions: [
        {
          positionId: "pos-1",
          traderAddress: "0xtrader",
          side: "YES",
          sharesHeld: 100,
          avgEntryPrice: 0.5,
          markPrice: 0.62,
          costBasis: 50,
          marketValue: 62,
          unrealizedPnl: 12,
        },
      ],
    };

    const result = formatMarketReport(report);

    expect(result.isOk() && result.value.split("\n")).toContain(
      "- pos-1 YES 100 @ 0.500 -> mark 0.620, pnl 12.00",
    );
  });

  it("refuses to render a non-finite figure and names its field", () => {
    const base = buildReport();
    const report: MarketReport = {
      ...base,
      summary: { ...base.summary, volumeWeightedYesPrice: Number.NaN },
    };

    const result = formatMarketReport(report);

    expect(result.isErr() && result.error).toEqual({
      kind: "formatting_failed",
      dataType: "market report",
      reason: "field 'summary.volumeWeightedYesPrice' is not a finite value",
    });
  });
});

describe("writeOutput", () => {
  it("hands text to the sink", () => {
    const written: string[] = [];
    const sink: OutputSinkPort = {
      target: "memory",
      write: (text) => {
        written.push(text);
      },
    };

    expect(writeOutput("report", sink).isOk()).toBe(true);
    expect(written).toEqual(["report"]);
  });

  it("reports a throwing sink as a write failure on its target", () => {
    const sink: OutputSinkPort = {
      target: "report.txt",
      write: () => {
        throw new Error("disk full");
      },
    };

    const result = writeOutput("report", sink);

    expect(result.isErr() && result.error).toEqual({
      kind: "write_failed",
      target: "report.txt",
      reason: "disk full",
    });
  });
});
