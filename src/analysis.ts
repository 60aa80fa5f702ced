import type { BandSet, Bit, CoefficientPosition, Matrix } from "./types";
import { ConfigurationError } from "./errors";
import { cloneBands, mulberry32 } from "./utils";

/** Peak signal-to-noise ratio in dB; `Infinity` for identical inputs. */
export function psnr(original: Matrix, distorted: Matrix, peak = 255): number {
  const rows = original.length;
  if (rows !== distorted.length || original.some((row, i) => row.length !== distorted[i].length)) {
    throw new ConfigurationError("psnr: inputs must have the same shape");
  }
  let sum = 0, n = 0;
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < original[i].length; j++) {
      const d = original[i][j] - distorted[i][j];
      sum += d * d;
      n++;
    }
  }
  if (n === 0) throw new ConfigurationError("psnr: inputs are empty");
  const mse = sum / n;
  return mse === 0 ? Infinity : 10 * Math.log10((peak * peak) / mse);
}

export function bitErrorRate(expected: readonly Bit[], actual: readonly Bit[]): number {
  if (expected.length !== actual.length) {
    throw new ConfigurationError(`bitErrorRate: length mismatch (${expected.length} vs ${actual.length})`);
  }
  if (expected.length === 0) return 0;
  let errors = 0;
  for (let i = 0; i < expected.length; i++) if (expected[i] !== actual[i]) errors++;
  return errors / expected.length;
}

/**
 * Simulates a noisy transform round trip: adds independent uniform noise in
 * [-amplitude, amplitude) to each listed position of a copy of `bands`.
 */
export function perturbPositions(
  bands: BandSet,
  positions: Iterable<CoefficientPosition>,
  amplitude: number,
  seed: number
): BandSet {
  const out = cloneBands(bands);
  const rnd = mulberry32(seed >>> 0);
  for (const { band, row, col } of positions) {
    const grid = out.get(band);
    if (!grid) throw new ConfigurationError(`Band ${band} is not in the band set`);
    grid[row][col] += (rnd() * 2 - 1) * amplitude;
  }
  return out;
}
