import { describe, expect, it } from "vitest";
import { CoefficientSelector } from "../selector";
import { ConfigurationError } from "../errors";
import { bandSetOf, constantBand, randomBand } from "./fixtures";

describe("CoefficientSelector", () => {
  const bands = bandSetOf(["HH1", constantBand(4, 5, 0)], ["HL1", constantBand(3, 3, 0)]);
  const margins = { rowSkip: 1, colSkip: 2 };

  it("walks bands in priority order, row-major, inside the margins", () => {
    const positions = [...CoefficientSelector.fromBands(bands, ["HH1", "HL1"], margins).positions()];
    expect(positions).toHaveLength(11);
    expect(positions.slice(0, 4)).toEqual([
      { band: "HH1", row: 1, col: 2 },
      { band: "HH1", row: 1, col: 3 },
      { band: "HH1", row: 1, col: 4 },
      { band: "HH1", row: 2, col: 2 },
    ]);
    expect(positions.slice(9)).toEqual([
      { band: "HL1", row: 1, col: 2 },
      { band: "HL1", row: 2, col: 2 },
    ]);
  });

  it("follows the priority list, not the band set order", () => {
    const first = CoefficientSelector.fromBands(bands, ["HL1", "HH1"], margins).positions().next();
    expect(first.value).toEqual({ band: "HL1", row: 1, col: 2 });
  });

  it("counts exactly what it enumerates", () => {
    const selector = CoefficientSelector.fromBands(bands, ["HH1", "HL1"], margins);
    expect(selector.count()).toBe(11);
    expect(selector.count()).toBe([...selector.positions()].length);
  });

  it("restarts on every call", () => {
    const selector = CoefficientSelector.fromBands(bands, ["HH1", "HL1"], margins);
    expect([...selector.positions()]).toEqual([...selector.positions()]);
  });

  it("depends on shapes only, never on coefficient values", () => {
    const a = bandSetOf(["HH1", randomBand(20, 24, 1)], ["LH2", randomBand(10, 12, 2)]);
    const b = bandSetOf(["HH1", randomBand(20, 24, 3)], ["LH2", randomBand(10, 12, 4)]);
    const m = { rowSkip: 3, colSkip: 5 };
    expect([...CoefficientSelector.fromBands(a, ["HH1", "LH2"], m).positions()]).toEqual([
      ...CoefficientSelector.fromBands(b, ["HH1", "LH2"], m).positions(),
    ]);
  });

  it("builds the same sequence from shapes alone", () => {
    const fromShapes = CoefficientSelector.fromShapes(
      [
        { name: "HH1", rows: 4, cols: 5 },
        { name: "HL1", rows: 3, cols: 3 },
      ],
      margins
    );
    expect([...fromShapes.positions()]).toEqual([
      ...CoefficientSelector.fromBands(bands, ["HH1", "HL1"], margins).positions(),
    ]);
  });

  describe("configuration errors", () => {
    it("rejects a row margin covering a whole band", () => {
      expect(() => CoefficientSelector.fromBands(bands, ["HH1"], { rowSkip: 4, colSkip: 0 })).toThrow(
        ConfigurationError
      );
    });

    it("rejects a column margin covering a whole band", () => {
      expect(() => CoefficientSelector.fromBands(bands, ["HH1", "HL1"], { rowSkip: 0, colSkip: 3 })).toThrow(
        ConfigurationError
      );
    });

    it("rejects negative or fractional margins", () => {
      expect(() => CoefficientSelector.fromBands(bands, ["HH1"], { rowSkip: -1, colSkip: 0 })).toThrow(
        ConfigurationError
      );
      expect(() => CoefficientSelector.fromBands(bands, ["HH1"], { rowSkip: 0, colSkip: 0.5 })).toThrow(
        ConfigurationError
      );
    });

    it("rejects missing, duplicated or no bands", () => {
      expect(() => CoefficientSelector.fromBands(bands, ["HH2"], margins)).toThrow(ConfigurationError);
      expect(() => CoefficientSelector.fromBands(bands, ["HH1", "HH1"], margins)).toThrow(ConfigurationError);
      expect(() => CoefficientSelector.fromBands(bands, [], margins)).toThrow(ConfigurationError);
    });

    it("rejects ragged grids", () => {
      const ragged = bandSetOf(["HH1", [[1, 2, 3], [4, 5]]]);
      expect(() => CoefficientSelector.fromBands(ragged, ["HH1"], { rowSkip: 0, colSkip: 0 })).toThrow(
        ConfigurationError
      );
    });
  });
});
