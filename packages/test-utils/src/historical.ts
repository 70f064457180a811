export interface HistoricalMetricsFixture {
  readonly provider: string;
  readonly successCount: number;
  readonly failureCount: number;
  readonly averageLatencyMs: number;
  readonly totalTokens: number;
  readonly totalCost: number;
  readonly lastSuccessAt?: number;
  readonly lastFailureAt?: number;
}

/**
 * Historical aggregates for one provider: a healthy record of 10 successes
 * at 500ms unless overridden.
 */
export function makeHistoricalMetrics(
  provider: string,
  overrides?: Partial<Omit<HistoricalMetricsFixture, "provider">>,
): HistoricalMetricsFixture {
  return {
    provider,
    successCount: 10,
    failureCount: 0,
    averageLatencyMs: 500,
    totalTokens: 300,
    totalCost: 0.01,
    ...overrides,
  };
}
