import type { BandName, BandSet, BandShape, CoefficientPosition, Margins } from "./types";
import { ConfigurationError } from "./errors";

/**
 * Deterministic enumeration of the coefficient positions the codec may write.
 *
 * Bands are walked in the given priority order and, inside each band, in
 * row-major order from `(rowSkip, colSkip)`. Only band shapes are consulted, so
 * cover bands and bands re-derived from a stego image of the same size yield
 * the same sequence.
 */
export class CoefficientSelector {
  readonly shapes: readonly BandShape[];
  readonly margins: Margins;

  private constructor(shapes: readonly BandShape[], margins: Margins) {
    this.shapes = shapes;
    this.margins = margins;
  }

  /** `shapes` must already be in priority order. */
  static fromShapes(shapes: readonly BandShape[], margins: Margins): CoefficientSelector {
    checkMargins(margins);
    if (shapes.length === 0) throw new ConfigurationError("Band priority list is empty");

    const seen = new Set<BandName>();
    for (const s of shapes) {
      if (seen.has(s.name)) throw new ConfigurationError(`Band ${s.name} listed twice`);
      seen.add(s.name);
      if (margins.rowSkip >= s.rows || margins.colSkip >= s.cols) {
        throw new ConfigurationError(
          `Margins (${margins.rowSkip}, ${margins.colSkip}) leave nothing of band ${s.name} (${s.rows}x${s.cols})`,
          { band: s.name, rows: s.rows, cols: s.cols, ...margins }
        );
      }
    }
    return new CoefficientSelector(shapes.map((s) => ({ ...s })), { ...margins });
  }

  static fromBands(bands: BandSet, order: readonly BandName[], margins: Margins): CoefficientSelector {
    return CoefficientSelector.fromShapes(
      order.map((name) => shapeOf(bands, name)),
      margins
    );
  }

  *positions(): Generator<CoefficientPosition, void, undefined> {
    const { rowSkip, colSkip } = this.margins;
    for (const { name, rows, cols } of this.shapes) {
      for (let row = rowSkip; row < rows; row++) {
        for (let col = colSkip; col < cols; col++) yield { band: name, row, col };
      }
    }
  }

  count(): number {
    const { rowSkip, colSkip } = this.margins;
    return this.shapes.reduce((n, s) => n + (s.rows - rowSkip) * (s.cols - colSkip), 0);
  }
}

function checkMargins({ rowSkip, colSkip }: Margins): void {
  if (!Number.isInteger(rowSkip) || !Number.isInteger(colSkip) || rowSkip < 0 || colSkip < 0) {
    throw new ConfigurationError(`Margins must be non-negative integers, got (${rowSkip}, ${colSkip})`);
  }
}

function shapeOf(bands: BandSet, name: BandName): BandShape {
  const grid = bands.get(name);
  if (!grid) throw new ConfigurationError(`Band ${name} is not in the band set`);
  const rows = grid.length;
  const cols = grid[0]?.length ?? 0;
  if (rows === 0 || cols === 0 || grid.some((r) => r.length !== cols)) {
    throw new ConfigurationError(`Band ${name} is not a rectangular non-empty grid`);
  }
  return { name, rows, cols };
}
