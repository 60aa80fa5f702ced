export type Bit = 0 | 1;

export type Matrix = number[][];

export type BandKind = "LL" | "HL" | "LH" | "HH";
export type BandName = `${BandKind}${number}`;

// Insertion order is irrelevant; selection order comes from a priority list.
export type BandSet = Map<BandName, Matrix>;

export interface BandShape {
  name: BandName;
  rows: number;
  cols: number;
}

export interface CoefficientPosition {
  band: BandName;
  row: number;
  col: number;
}

export interface Margins {
  rowSkip: number;
  colSkip: number;
}

export interface StepRule {
  maxBytes: number; // inclusive upper bound
  q: number;
}

export interface CodecOptions {
  bandOrder?: readonly BandName[];
  rowSkip?: number;
  colSkip?: number;
}

export interface ImageStegoOptions extends CodecOptions {
  channel?: 0 | 1 | 2;
  levels?: number;
}

export interface CapacityReport {
  bits: number;
  bytes: number;
  maxPayloadBytes: number;
}

export interface EmbedResult {
  bands: BandSet;
  length: number;
  q: number;
  bitsWritten: number;
  capacityBits: number;
}

export interface ExtractResult {
  payload: Uint8Array;
  length: number;
  q: number;
}

export interface ImageEmbedResult {
  image: Buffer;
  q: number;
  capacityBytes: number;
  psnr: number;
}
