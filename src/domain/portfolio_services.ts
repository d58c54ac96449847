export type HoldingSnapshot = {
  ticker: string;
  instrumentName: string;
  platform: string;
  units: number;
  currentPrice: number;
  currentValue: number;
  boughtValue: number;
  gainLoss: number;
  gainLossPercentage: number;
};

export type HoldingsSummary = {
  accountId: string;
  date: string;
  holdings: HoldingSnapshot[];
  totalValue: number;
  totalBoughtValue: number;
  totalGainLoss: number;
  totalGainLossPercentage: number;
  totalHoldings: number;
};

export type HoldingPerformance = {
  ticker: string;
  instrumentName: string;
  currentValue: number;
  gainLoss: number;
  gainLossPercentage: number;
};

export type PerformanceAnalysis = {
  accountId: string;
  analysisDate: string;
  totalValue: number;
  dayChange: number;
  dayChangePercentage: number;
  holdingPerformance: HoldingPerformance[];
  metrics: {
    totalReturn: number;
    totalReturnPercentage: number;
    topPerformers: HoldingPerformance[];
    bottomPerformers: HoldingPerformance[];
  };
};

export type HoldingComparison = {
  ticker: string;
  instrumentName: string;
  startValue: number;
  endValue: number;
  change: number;
  changePercentage: number;
};

export type PerformanceComparison = {
  accountId: string;
  startDate: string;
  endDate: string;
  startValue: number;
  endValue: number;
  totalChange: number;
  totalChangePercentage: number;
  holdingComparisons: HoldingComparison[];
};

// Dates are ISO calendar dates (YYYY-MM-DD); account ids come from the tool binding, never from the model.

export interface HoldingsService {
  getHoldings(accountId: string, date: string, signal?: AbortSignal): Promise<HoldingsSummary | null>;
}

export interface PortfolioAnalysisService {
  analyzePerformance(accountId: string, analysisDate: string, signal?: AbortSignal): Promise<PerformanceAnalysis>;
  comparePerformance(
    accountId: string,
    startDate: string,
    endDate: string,
    signal?: AbortSignal
  ): Promise<PerformanceComparison>;
}

export interface MarketDataService {
  /** Prices for the tickers it knows; unknown tickers are omitted. */
  getPrices(tickers: string[], signal?: AbortSignal): Promise<Record<string, number>>;
}

export type PortfolioServices = {
  holdings: HoldingsService;
  analysis: PortfolioAnalysisService;
  marketData?: MarketDataService;
};
