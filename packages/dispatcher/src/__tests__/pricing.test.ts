import { describe, expect, it } from "vitest";
import { PricingTable } from "../pricing.js";

describe("PricingTable", () => {
  const table = new PricingTable();

  it("estimates cost from per-million prices", () => {
    // 1000 × 30/1M + 500 × 60/1M
    expect(table.estimateCost({ provider: "openai", model: "gpt-4" }, 1000, 500)).toBeCloseTo(
      0.06,
    );
  });

  it("prices unknown models at the default row", () => {
    expect(table.estimateCost({ provider: "x", model: "mystery" }, 1_000_000, 0)).toBe(10);
    expect(table.unitPrice({ provider: "x", model: "mystery" })).toBe(20);
  });

  it("blends input and output for the unit price", () => {
    expect(table.unitPrice({ provider: "anthropic", model: "claude-3-haiku-20240307" })).toBe(
      0.75,
    );
    expect(table.unitPrice({ provider: "openai", model: "gpt-3.5-turbo" })).toBe(1);
  });

  it("accepts a custom table", () => {
    const custom = new PricingTable({ tiny: { inputPerMillion: 1, outputPerMillion: 3 } });

    expect(custom.unitPrice({ provider: "local", model: "tiny" })).toBe(2);
    // no default row: built-in fallback of 10/30
    expect(custom.unitPrice({ provider: "local", model: "other" })).toBe(20);
  });
});
