import type { BandName, BandSet, BandShape, Matrix } from "./types";
import { ConfigurationError } from "./errors";

/* ------------------------ Single-level Haar ------------------------ */
// Orthonormal 2x2 Haar. For a block [a b; c d]:
//   LL = (a+b+c+d)/2  HL = (a-b+c-d)/2  LH = (a+b-c-d)/2  HH = (a-b-c+d)/2
export function haarDWT(mat: Matrix): [Matrix, Matrix, Matrix, Matrix] {
  const H = mat.length, W = mat[0]?.length ?? 0;
  if (H === 0 || W === 0 || H % 2 !== 0 || W % 2 !== 0) {
    throw new ConfigurationError(`haarDWT: dimensions must be even and non-zero (${H}x${W})`);
  }
  const h = H / 2, w = W / 2;
  const LL: Matrix = [], HL: Matrix = [], LH: Matrix = [], HH: Matrix = [];
  for (let i = 0; i < h; i++) {
    const top = mat[2 * i], bottom = mat[2 * i + 1];
    const ll: number[] = [], hl: number[] = [], lh: number[] = [], hh: number[] = [];
    for (let j = 0; j < w; j++) {
      const a = top[2 * j], b = top[2 * j + 1];
      const c = bottom[2 * j], d = bottom[2 * j + 1];
      ll.push((a + b + c + d) / 2);
      hl.push((a - b + c - d) / 2);
      lh.push((a + b - c - d) / 2);
      hh.push((a - b - c + d) / 2);
    }
    LL.push(ll); HL.push(hl); LH.push(lh); HH.push(hh);
  }
  return [LL, HL, LH, HH];
}

export function haarIDWT(LL: Matrix, HL: Matrix, LH: Matrix, HH: Matrix): Matrix {
  const h = LL.length, w = LL[0]?.length ?? 0;
  const out: Matrix = [];
  for (let i = 0; i < h; i++) {
    const top: number[] = [], bottom: number[] = [];
    for (let j = 0; j < w; j++) {
      const ll = LL[i][j], hl = HL[i][j], lh = LH[i][j], hh = HH[i][j];
      top.push((ll + hl + lh + hh) / 2, (ll - hl + lh - hh) / 2);
      bottom.push((ll + hl - lh - hh) / 2, (ll - hl - lh + hh) / 2);
    }
    out.push(top, bottom);
  }
  return out;
}

/* --------------------------- Multi-level --------------------------- */
function checkGeometry(height: number, width: number, levels: number): void {
  if (!Number.isInteger(levels) || levels < 1) {
    throw new ConfigurationError(`Decomposition levels must be a positive integer, got ${levels}`);
  }
  const block = 2 ** levels;
  if (height === 0 || width === 0 || height % block !== 0 || width % block !== 0) {
    throw new ConfigurationError(
      `Image ${height}x${width} cannot be decomposed to ${levels} levels (sides must be multiples of ${block})`,
      { height, width, levels }
    );
  }
}

export function decompose(mat: Matrix, levels: number): BandSet {
  checkGeometry(mat.length, mat[0]?.length ?? 0, levels);
  const bands: BandSet = new Map();
  let LL = mat;
  for (let k = 1; k <= levels; k++) {
    const [ll, hl, lh, hh] = haarDWT(LL);
    bands.set(`HL${k}`, hl);
    bands.set(`LH${k}`, lh);
    bands.set(`HH${k}`, hh);
    LL = ll;
  }
  bands.set(`LL${levels}`, LL);
  return bands;
}

function requireBand(bands: BandSet, name: BandName): Matrix {
  const band = bands.get(name);
  if (!band) throw new ConfigurationError(`reconstruct: missing band ${name}`);
  return band;
}

export function reconstruct(bands: BandSet, levels: number): Matrix {
  let LL = requireBand(bands, `LL${levels}`);
  for (let k = levels; k >= 1; k--) {
    LL = haarIDWT(LL, requireBand(bands, `HL${k}`), requireBand(bands, `LH${k}`), requireBand(bands, `HH${k}`));
  }
  return LL;
}

// Detail-band shapes of a `levels`-deep decomposition; depends on geometry only.
export function bandShapes(height: number, width: number, levels: number): BandShape[] {
  checkGeometry(height, width, levels);
  const shapes: BandShape[] = [];
  for (let k = 1; k <= levels; k++) {
    const rows = height / 2 ** k, cols = width / 2 ** k;
    shapes.push({ name: `HL${k}`, rows, cols }, { name: `LH${k}`, rows, cols }, { name: `HH${k}`, rows, cols });
  }
  shapes.push({ name: `LL${levels}`, rows: height / 2 ** levels, cols: width / 2 ** levels });
  return shapes;
}
