import { PNG } from "pngjs";
import type { BandName, BandSet, Matrix } from "../types";
import { mulberry32 } from "../utils";

export function constantBand(rows: number, cols: number, value: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(value));
}

export function randomBand(rows: number, cols: number, seed: number, spread = 50): Matrix {
  const rnd = mulberry32(seed);
  return Array.from({ length: rows }, () => Array.from({ length: cols }, () => (rnd() * 2 - 1) * spread));
}

export function bandSetOf(...entries: [BandName, Matrix][]): BandSet {
  return new Map(entries);
}

export function randomBytes(n: number, seed: number): Uint8Array {
  const rnd = mulberry32(seed);
  return Uint8Array.from({ length: n }, () => Math.floor(rnd() * 256));
}

export function solidPng(width: number, height: number, rgba: [number, number, number, number]): Buffer {
  const png = new PNG({ width, height });
  for (let i = 0; i < width * height; i++) png.data.set(rgba, i * 4);
  return PNG.sync.write(png);
}

// Textured RGBA cover; every channel drawn uniformly from [lo, hi].
export function noisyPng(width: number, height: number, seed: number, lo = 0, hi = 255): Buffer {
  const rnd = mulberry32(seed);
  const png = new PNG({ width, height });
  for (let i = 0; i < width * height; i++) {
    for (let ch = 0; ch < 3; ch++) png.data[i * 4 + ch] = lo + Math.floor(rnd() * (hi - lo + 1));
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png);
}
