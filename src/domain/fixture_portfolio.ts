import * as fs from "node:fs";

import { z } from "zod";

import { ConfigurationError } from "../errors/agent_errors";
import { silentLogger, type AgentLogger } from "../logger";
import { shiftIsoDate } from "./dates";
import type {
  HoldingComparison,
  HoldingPerformance,
  HoldingsService,
  HoldingsSummary,
  MarketDataService,
  PerformanceAnalysis,
  PerformanceComparison,
  PortfolioAnalysisService,
} from "./portfolio_services";

const FixtureHoldingSchema = z.object({
  ticker: z.string().min(1),
  instrumentName: z.string(),
  platform: z.string().default("UNKNOWN"),
  units: z.number().nonnegative(),
  price: z.number().nonnegative(),
  boughtValue: z.number().nonnegative(),
});

const SnapshotSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  holdings: z.array(FixtureHoldingSchema),
});

export const PortfolioFixtureSchema = z.object({
  accounts: z.record(z.object({ snapshots: z.array(SnapshotSchema) })),
  prices: z.record(z.number().nonnegative()).default({}),
});

export type PortfolioFixture = z.infer<typeof PortfolioFixtureSchema>;
export type PortfolioFixtureInput = z.input<typeof PortfolioFixtureSchema>;

const TOP_PERFORMERS = 3;

const round2 = (value: number) => Math.round(value * 100) / 100;

const percent = (part: number, whole: number) => (whole > 0 ? round2((part / whole) * 100) : 0);

export function loadPortfolioFixture(path: string, log: AgentLogger = silentLogger): PortfolioFixture {
  if (!fs.existsSync(path)) {
    log.warn({ evt: "portfolio_fixture.missing", path }, "portfolio_fixture.missing");
    return { accounts: {}, prices: {} };
  }

  const parsed = PortfolioFixtureSchema.safeParse(JSON.parse(fs.readFileSync(path, "utf8")));
  if (!parsed.success) {
    throw new ConfigurationError(`portfolio fixture ${path} is invalid: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

/**
 * Demo domain services over a JSON fixture of dated holdings snapshots. A
 * lookup for a date uses the latest snapshot on or before it.
 */
export class FixturePortfolioServices implements HoldingsService, PortfolioAnalysisService, MarketDataService {
  private fixture: PortfolioFixture;

  constructor(fixture: PortfolioFixtureInput) {
    this.fixture = PortfolioFixtureSchema.parse(fixture);
  }

  async getHoldings(accountId: string, date: string): Promise<HoldingsSummary | null> {
    return this.summarize(accountId, date);
  }

  async analyzePerformance(accountId: string, analysisDate: string): Promise<PerformanceAnalysis> {
    const current = this.summarize(accountId, analysisDate);
    if (!current) {
      return {
        accountId,
        analysisDate,
        totalValue: 0,
        dayChange: 0,
        dayChangePercentage: 0,
        holdingPerformance: [],
        metrics: { totalReturn: 0, totalReturnPercentage: 0, topPerformers: [], bottomPerformers: [] },
      };
    }

    const previous = this.summarize(accountId, shiftIsoDate(analysisDate, -1));
    const dayChange = previous ? round2(current.totalValue - previous.totalValue) : 0;

    const performance: HoldingPerformance[] = current.holdings.map((holding) => ({
      ticker: holding.ticker,
      instrumentName: holding.instrumentName,
      currentValue: holding.currentValue,
      gainLoss: holding.gainLoss,
      gainLossPercentage: holding.gainLossPercentage,
    }));
    const ranked = [...performance].sort((a, b) => b.gainLossPercentage - a.gainLossPercentage);

    return {
      accountId,
      analysisDate,
      totalValue: current.totalValue,
      dayChange,
      dayChangePercentage: previous ? percent(dayChange, previous.totalValue) : 0,
      holdingPerformance: performance,
      metrics: {
        totalReturn: current.totalGainLoss,
        totalReturnPercentage: current.totalGainLossPercentage,
        topPerformers: ranked.slice(0, TOP_PERFORMERS),
        bottomPerformers: ranked.slice(-TOP_PERFORMERS).reverse(),
      },
    };
  }

  async comparePerformance(accountId: string, startDate: string, endDate: string): Promise<PerformanceComparison> {
    const start = this.summarize(accountId, startDate);
    const end = this.summarize(accountId, endDate);
    const startValue = start?.totalValue ?? 0;
    const endValue = end?.totalValue ?? 0;
    const totalChange = round2(endValue - startValue);

    const byTicker = new Map<string, HoldingComparison>();
    for (const holding of end?.holdings ?? []) {
      byTicker.set(holding.ticker, {
        ticker: holding.ticker,
        instrumentName: holding.instrumentName,
        startValue: 0,
        endValue: holding.currentValue,
        change: 0,
        changePercentage: 0,
      });
    }
    for (const holding of start?.holdings ?? []) {
      const entry = byTicker.get(holding.ticker) ?? {
        ticker: holding.ticker,
        instrumentName: holding.instrumentName,
        startValue: 0,
        endValue: 0,
        change: 0,
        changePercentage: 0,
      };
      entry.startValue = holding.currentValue;
      byTicker.set(holding.ticker, entry);
    }

    const holdingComparisons = [...byTicker.values()].map((entry) => {
      const change = round2(entry.endValue - entry.startValue);
      return { ...entry, change, changePercentage: percent(change, entry.startValue) };
    });

    return {
      accountId,
      startDate,
      endDate,
      startValue,
      endValue,
      totalChange,
      totalChangePercentage: percent(totalChange, startValue),
      holdingComparisons,
    };
  }

  async getPrices(tickers: string[]): Promise<Record<string, number>> {
    const prices: Record<string, number> = {};
    for (const ticker of tickers) {
      const key = ticker.toUpperCase();
      const price = this.fixture.prices[key];
      if (price !== undefined) prices[key] = price;
    }
    return prices;
  }

  private summarize(accountId: string, date: string): HoldingsSummary | null {
    const snapshots = this.fixture.accounts[accountId]?.snapshots ?? [];
    const snapshot = snapshots
      .filter((candidate) => candidate.date <= date)
      .sort((a, b) => a.date.localeCompare(b.date))
      .at(-1);
    if (!snapshot) return null;

    const holdings = snapshot.holdings.map((holding) => {
      const currentValue = round2(holding.units * holding.price);
      const gainLoss = round2(currentValue - holding.boughtValue);
      return {
        ticker: holding.ticker,
        instrumentName: holding.instrumentName,
        platform: holding.platform,
        units: holding.units,
        currentPrice: holding.price,
        currentValue,
        boughtValue: holding.boughtValue,
        gainLoss,
        gainLossPercentage: percent(gainLoss, holding.boughtValue),
      };
    });

    const totalValue = round2(holdings.reduce((sum, holding) => sum + holding.currentValue, 0));
    const totalBoughtValue = round2(holdings.reduce((sum, holding) => sum + holding.boughtValue, 0));
    const totalGainLoss = round2(totalValue - totalBoughtValue);

    return {
      accountId,
      date,
      holdings,
      totalValue,
      totalBoughtValue,
      totalGainLoss,
      totalGainLossPercentage: percent(totalGainLoss, totalBoughtValue),
      totalHoldings: holdings.length,
    };
  }
}
