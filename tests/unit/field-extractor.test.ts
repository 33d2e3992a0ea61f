import { describe, expect, it } from "vitest";
import {
  extractDate,
  extractFields,
  extractTotals,
  guessMerchant,
  isTimeShaped,
  TOTAL_LINE_HINTS,
} from "../../src/receipts/fieldExtractor";

describe("extractDate", () => {
  it("returns the first day-month-year match verbatim", () => {
    expect(extractDate("INV 1234 ... 19/02/2026 17:09 ...")).toBe("19/02/2026");
    expect(extractDate("Date 12-03-19 Cashier 2")).toBe("12-03-19");
  });

  it("falls back to the ISO shape", () => {
    expect(extractDate("DATE 2018-02-09\nTOTAL 5.00")).toBe("2018-02-09");
  });

  it("prefers the day-first pattern even when an ISO date appears earlier", () => {
    expect(extractDate("2018-02-09 printed\nsale 09/02/2018")).toBe("09/02/2018");
  });

  it("is total over empty and non-text input", () => {
    expect(extractDate("")).toBeNull();
    expect(extractDate("   ")).toBeNull();
    expect(extractDate(undefined)).toBeNull();
    expect(extractDate(42)).toBeNull();
    expect(extractDate("no dates here")).toBeNull();
  });
});

describe("extractTotals", () => {
  const receipt = ["ACME STORE", "SUBTOTAL 45.00", "ROUNDED TOTAL 45.50", "CASH 50.00", "CHANGE 4.50"].join("\n");

  it("orders candidates by hint priority, then line order", () => {
    expect(extractTotals(receipt)).toEqual(["45.50", "45.00", "50.00"]);
  });

  it("drops time-shaped values such as a clock stamp on the line above", () => {
    expect(extractTotals("09.21\nTOTAL 32.40")).toEqual(["32.40"]);
    expect(isTimeShaped("09.21")).toBe(true);
    expect(isTimeShaped("4.50")).toBe(true);
    expect(isTimeShaped("24.10")).toBe(false);
    expect(isTimeShaped("12.60")).toBe(false);
  });

  it("normalizes comma decimals", () => {
    expect(extractTotals("TOTAL 38,90")).toEqual(["38.90"]);
  });

  it("deduplicates while keeping first occurrence", () => {
    expect(extractTotals("TOTAL 45.50\nTOTAL PAYABLE 45.50\nCASH 50.00")).toEqual(["45.50", "50.00"]);
  });

  it("falls back to a whole-text scan only when no hint line yields a value", () => {
    expect(extractTotals("Printed 09.21\nAmount 58.10 paid\nItem 31.20")).toEqual(["58.10", "31.20"]);
  });

  it("does not use the fallback once a hint line produced a value", () => {
    expect(extractTotals("Item 31.20\nTOTAL 58.10")).toEqual(["58.10"]);
  });

  it("uses the explicit priority, not the array order, of the hint list", () => {
    const reversed = [...TOTAL_LINE_HINTS].reverse();
    expect(extractTotals(receipt, reversed)).toEqual(extractTotals(receipt));
  });

  it("returns no duplicates for any extraction", () => {
    const totals = extractTotals("TOTAL 30.75 30.75\nCASH 30.75\nCHANGE 40.00\nTOTAL: 40.00");
    expect(new Set(totals).size).toBe(totals.length);
    expect(totals).toEqual(["40.00", "30.75"]);
  });

  it("is total over empty and non-text input", () => {
    expect(extractTotals("")).toEqual([]);
    expect(extractTotals("\n \n")).toEqual([]);
    expect(extractTotals(null)).toEqual([]);
    expect(extractTotals({ text: "TOTAL 5.00" })).toEqual([]);
  });
});

describe("guessMerchant", () => {
  it("returns the first non-blacklisted line with at least three letters", () => {
    expect(guessMerchant(["TOTAL 5.00", "ACME STORE SDN BHD", "THANK YOU"].join("\n"))).toBe("ACME STORE SDN BHD");
  });

  it("skips code-like lines and blacklisted substrings", () => {
    expect(guessMerchant("12345\nTELECOM HUB\nAB 12\nBest Mart\nTOTAL 1.00")).toBe("Best Mart");
  });

  it("truncates to sixty characters", () => {
    const long = "B".repeat(70);
    expect(guessMerchant(`12345\n${long}`)).toBe("B".repeat(60));
  });

  it("only looks at the first twelve lines", () => {
    const lines = Array.from({ length: 12 }, () => "1.00");
    lines.push("LATE SHOP NAME");
    expect(guessMerchant(lines.join("\n"))).toBeNull();
  });

  it("uses the trimmed text when there are no line breaks", () => {
    expect(guessMerchant("  Kedai Runcit Ali  ")).toBe("Kedai Runcit Ali");
    expect(guessMerchant("12345 678")).toBeNull();
  });

  it("is total over empty and non-text input", () => {
    expect(guessMerchant("")).toBeNull();
    expect(guessMerchant("   \n  ")).toBeNull();
    expect(guessMerchant(undefined)).toBeNull();
  });
});

describe("extractFields", () => {
  it("combines the three heuristics", () => {
    const text = "ACME STORE SDN BHD\nDate: 19/02/2026\nTOTAL 38,90";
    expect(extractFields(text)).toEqual({
      merchant: "ACME STORE SDN BHD",
      date: "19/02/2026",
      totals: ["38.90"],
    });
  });
});
