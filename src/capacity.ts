import type { CapacityReport, CodecOptions } from "./types";
import { CoefficientSelector } from "./selector";
import { bandShapes } from "./dwt";
import { config } from "./config";
import { ConfigurationError } from "./errors";

const FRAME_HEADER_BYTES = config.headerBits / 8;

export function capacityBits(selector: CoefficientSelector): number {
  return selector.count();
}

export function capacityBytes(selector: CoefficientSelector): number {
  return Math.floor(capacityBits(selector) / 8);
}

// Largest payload whose frame (header included) fits.
export function maxPayloadBytes(selector: CoefficientSelector): number {
  return Math.max(0, capacityBytes(selector) - FRAME_HEADER_BYTES);
}

export function capacityReport(selector: CoefficientSelector): CapacityReport {
  return {
    bits: capacityBits(selector),
    bytes: capacityBytes(selector),
    maxPayloadBytes: maxPayloadBytes(selector),
  };
}

/** Capacity of an image of the given size, computed from geometry alone. */
export function estimateCapacity(
  height: number,
  width: number,
  options: CodecOptions & { levels?: number } = {}
): CapacityReport {
  const levels = options.levels ?? config.levels;
  const order = options.bandOrder ?? config.bandOrder;
  const shapes = bandShapes(height, width, levels);
  const selector = CoefficientSelector.fromShapes(
    order.map((name) => {
      const shape = shapes.find((s) => s.name === name);
      if (!shape) throw new ConfigurationError(`Band ${name} does not exist at ${levels} levels`);
      return shape;
    }),
    { rowSkip: options.rowSkip ?? config.rowSkip, colSkip: options.colSkip ?? config.colSkip }
  );
  return capacityReport(selector);
}
