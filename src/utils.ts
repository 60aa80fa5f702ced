import type { BandSet, Bit } from "./types";
import { FrameError } from "./errors";

// MSB first
export function toBits(bytes: Uint8Array): Bit[] {
  const bits: Bit[] = [];
  for (const b of bytes) {
    for (let i = 7; i >= 0; i--) bits.push((b >> i) & 1 ? 1 : 0);
  }
  return bits;
}

export function fromBits(bits: readonly Bit[], strict = false): Uint8Array {
  if (strict && bits.length % 8 !== 0) {
    throw new FrameError(`fromBits: length is not a multiple of 8 (${bits.length})`);
  }
  const out = new Uint8Array(Math.floor(bits.length / 8));
  for (let i = 0; i < out.length; i++) {
    let b = 0;
    for (let k = 0; k < 8; k++) b = (b << 1) | (bits[i * 8 + k] & 1);
    out[i] = b;
  }
  return out;
}

export function u32ToBits(n: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = 31; i >= 0; i--) bits.push((n >>> i) & 1 ? 1 : 0);
  return bits;
}

export function bitsToU32(bits: readonly Bit[], start = 0): number {
  if (start + 32 > bits.length) {
    throw new FrameError(`bitsToU32: need 32 bits from start=${start}, have ${bits.length - start}`);
  }
  let n = 0;
  for (let i = 0; i < 32; i++) n = (n << 1) | (bits[start + i] & 1);
  return n >>> 0;
}

export function posMod(a: number, m: number): number {
  return ((a % m) + m) % m;
}

// Simple and deterministic PRNG (mulberry32)
export function mulberry32(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function cloneBands(bands: BandSet): BandSet {
  const out: BandSet = new Map();
  for (const [name, grid] of bands) out.set(name, grid.map((row) => row.slice()));
  return out;
}
