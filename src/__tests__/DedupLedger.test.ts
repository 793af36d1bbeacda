import { DedupLedger } from "@app/services/DedupLedger";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("DedupLedger", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("records a success only once", () => {
    const ledger = new DedupLedger();

    expect(ledger.markSuccess("m1")).toBe(true);
    expect(ledger.markSuccess("m1")).toBe(false);
    expect(ledger.has("m1")).toBe(true);
    expect(ledger.size).toBe(1);
  });

  it("forgets ids once the retention window has passed", () => {
    const ledger = new DedupLedger(1000);
    ledger.markSuccess("m1");

    vi.setSystemTime(1000);
    expect(ledger.has("m1")).toBe(true);

    vi.setSystemTime(1001);
    expect(ledger.has("m1")).toBe(false);
    expect(ledger.markSuccess("m1")).toBe(true);
  });

  it("evicts the oldest entries beyond the size bound", () => {
    const ledger = new DedupLedger(60_000, 2);
    ledger.markSuccess("a");
    ledger.markSuccess("b");
    ledger.markSuccess("c");

    expect(ledger.size).toBe(2);
    expect(ledger.has("a")).toBe(false);
    expect(ledger.has("c")).toBe(true);
  });

  it("evicts expired entries up to the first live one", () => {
    const ledger = new DedupLedger(100);
    ledger.markSuccess("a");
    vi.setSystemTime(50);
    ledger.markSuccess("b");

    expect(ledger.evictExpired(120)).toBe(1);
    expect(ledger.size).toBe(1);

    ledger.clear();
    expect(ledger.size).toBe(0);
  });
});
