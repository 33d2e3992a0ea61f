import { describe, expect, it } from "vitest";
import { normalizeLine, normalizeText } from "../../src/receipts/textNormalizer";

describe("normalizeText", () => {
  it("repairs comma decimals", () => {
    expect(normalizeText("TOTAL 38,90")).toBe("TOTAL 38.90");
    expect(normalizeText("Cash 11,.10")).toBe("Cash 11.10");
  });

  it("repairs a semicolon in a time stamp", () => {
    expect(normalizeText("Time 17:09;21")).toBe("Time 17:09:21");
  });

  it("rejoins split possessives", () => {
    expect(normalizeText("McDonald ' s")).toBe("McDonald's");
  });

  it("removes space before punctuation and collapses runs of spaces", () => {
    expect(normalizeText("Price  :   5.00")).toBe("Price: 5.00");
  });

  it("leaves thousands separators alone", () => {
    expect(normalizeText("TOTAL 1,234.56")).toBe("TOTAL 1,234.56");
  });

  it("keeps line boundaries and drops empty lines", () => {
    expect(normalizeText("  A  \n\n\t\nB\tC  ")).toBe("A\nB\tC");
    expect(normalizeText("A\r\nB\rC")).toBe("A\nB\nC");
  });

  it("reaches a fixed point when one repair exposes another", () => {
    expect(normalizeLine("1, .23")).toBe("1.23");
  });

  it("is idempotent", () => {
    const samples = [
      "TOTAL 38,90",
      "1, .23",
      "McDonald ' s  ,  Big   Mac",
      "17:09;21  ;  x",
      "A , B , C\n\n  12 ,  50 ,.10",
      "Cash 11 ,.10\r\nChange 0 , 20",
    ];
    for (const s of samples) {
      const once = normalizeText(s);
      expect(normalizeText(once)).toBe(once);
    }
  });

  it("returns an empty string for non-text input", () => {
    expect(normalizeText(undefined)).toBe("");
    expect(normalizeText(12)).toBe("");
    expect(normalizeText("")).toBe("");
  });
});
