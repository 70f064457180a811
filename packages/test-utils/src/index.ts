export const PACKAGE_NAME = "@relaykit/test-utils" as const;

export { type HistoricalMetricsFixture, makeHistoricalMetrics } from "./historical.js";
export {
  createMockResult,
  hangingCall,
  type MockCallResult,
  type MockProviderSpec,
  type ProviderScript,
  type RecordedCall,
  type ScriptEntry,
  ScriptedProviderCall,
} from "./mock-provider.js";
export { InMemorySpendLedger, type SpendEntry } from "./spend-ledger.js";
