import type { BandName, StepRule } from "./types";

const bandOrder: readonly BandName[] = ["HH1", "HL1", "LH1", "HH2", "HL2", "LH2"];

// Payload length -> q; from PSNR/robustness tuning on 512x512 covers.
const stepTable: readonly StepRule[] = [
  { maxBytes: 2000, q: 4.0 },
  { maxBytes: 5000, q: 6.0 },
  { maxBytes: Infinity, q: 7.0 },
];

// Protocol constants: embedder and extractor must agree on every value here.
export const config = {
  levels: 2,
  channel: 0 as const,
  bandOrder,
  // Border rows/cols skipped in every band; coefficients there are small and unstable.
  rowSkip: 16,
  colSkip: 16,
  headerStep: 4.0, // Q0, used for the 32-bit length header only
  headerBits: 32,
  maxPayloadBytes: 10 * 1024 * 1024, // 10MB
  stepTable,
};
