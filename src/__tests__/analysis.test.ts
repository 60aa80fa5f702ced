import { describe, expect, it } from "vitest";
import { bitErrorRate, perturbPositions, psnr } from "../analysis";
import { ConfigurationError } from "../errors";
import { bandSetOf, constantBand } from "./fixtures";

describe("psnr", () => {
  it("is infinite for identical inputs", () => {
    expect(psnr([[1, 2]], [[1, 2]])).toBe(Infinity);
  });

  it("is 0 dB at full-scale error", () => {
    expect(psnr([[0, 0]], [[255, 255]])).toBeCloseTo(0, 10);
  });

  it("is 20*log10(255) for a unit error", () => {
    expect(psnr([[10]], [[11]])).toBeCloseTo(48.1308, 4);
  });

  it("rejects mismatched shapes", () => {
    expect(() => psnr([[1, 2]], [[1]])).toThrow(ConfigurationError);
  });
});

describe("bitErrorRate", () => {
  it("counts differing bits", () => {
    expect(bitErrorRate([0, 1, 1, 0], [0, 0, 1, 1])).toBe(0.5);
    expect(bitErrorRate([], [])).toBe(0);
  });

  it("rejects length mismatches", () => {
    expect(() => bitErrorRate([0, 1], [0])).toThrow(ConfigurationError);
  });
});

describe("perturbPositions", () => {
  const bands = bandSetOf(["HH1", constantBand(4, 4, 10)]);
  const targets = [
    { band: "HH1" as const, row: 0, col: 1 },
    { band: "HH1" as const, row: 3, col: 3 },
  ];

  it("adds bounded noise only at the given positions, on a copy", () => {
    const noisy = perturbPositions(bands, targets, 0.5, 9);
    const grid = noisy.get("HH1") ?? [];
    expect(bands.get("HH1")).toEqual(constantBand(4, 4, 10));
    for (let r = 0; r < 4; r++) {
      for (let c = 0; c < 4; c++) {
        const hit = targets.some((t) => t.row === r && t.col === c);
        if (hit) expect(Math.abs(grid[r][c] - 10)).toBeLessThanOrEqual(0.5);
        else expect(grid[r][c]).toBe(10);
      }
    }
  });

  it("is reproducible for a given seed", () => {
    expect(perturbPositions(bands, targets, 2, 5)).toEqual(perturbPositions(bands, targets, 2, 5));
  });

  it("rejects positions in unknown bands", () => {
    expect(() => perturbPositions(bands, [{ band: "HL1", row: 0, col: 0 }], 1, 1)).toThrow(ConfigurationError);
  });
});
