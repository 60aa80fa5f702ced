import type {
  BandSet,
  Bit,
  CodecOptions,
  CoefficientPosition,
  EmbedResult,
  ExtractResult,
  Margins,
  Matrix,
} from "./types";
import {
  CapacityExceededError,
  ConfigurationError,
  CorruptHeaderError,
  SessionStateError,
} from "./errors";
import { CoefficientSelector } from "./selector";
import { capacityBits } from "./capacity";
import { AdaptiveStepPolicy, DEFAULT_STEP_POLICY } from "./step-policy";
import { embedBit, extractBit } from "./qim";
import { decodeLength, frameBits, unframe } from "./frame";
import { cloneBands } from "./utils";
import { config } from "./config";
import * as logger from "./logger";

/**
 * Everything both sides of a transfer must share besides the image geometry.
 * The header step never depends on the step policy, so the length can always
 * be read back before the payload step is known.
 */
export interface StegoProtocol {
  headerStep: number;
  stepPolicy: AdaptiveStepPolicy;
  maxPayloadBytes: number;
}

export const DEFAULT_PROTOCOL: StegoProtocol = {
  headerStep: config.headerStep,
  stepPolicy: DEFAULT_STEP_POLICY,
  maxPayloadBytes: config.maxPayloadBytes,
};

export type SessionPhase = "init" | "header" | "payload" | "done" | "failed";

function resolveMargins(options: CodecOptions): Margins {
  return { rowSkip: options.rowSkip ?? config.rowSkip, colSkip: options.colSkip ?? config.colSkip };
}

function selectorFor(bands: BandSet, options: CodecOptions): CoefficientSelector {
  return CoefficientSelector.fromBands(bands, options.bandOrder ?? config.bandOrder, resolveMargins(options));
}

function bandOf(bands: BandSet, pos: CoefficientPosition): Matrix {
  const grid = bands.get(pos.band);
  if (!grid) throw new ConfigurationError(`Band ${pos.band} is not in the band set`);
  return grid;
}

// Up to `n` positions; fewer only when the selector runs out.
function take(cursor: Iterator<CoefficientPosition>, n: number): CoefficientPosition[] {
  const out: CoefficientPosition[] = [];
  while (out.length < n) {
    const next = cursor.next();
    if (next.done) break;
    out.push(next.value);
  }
  return out;
}

/* ============================== EMBED ================================= */
export class EmbeddingSession {
  private _phase: SessionPhase = "init";
  private readonly bands: BandSet;
  private readonly payload: Uint8Array;
  private readonly selector: CoefficientSelector;
  private readonly protocol: StegoProtocol;

  constructor(bands: BandSet, payload: Uint8Array, options: CodecOptions = {}, protocol = DEFAULT_PROTOCOL) {
    // working copy: the caller's coefficients are never touched
    this.bands = cloneBands(bands);
    this.payload = payload.slice();
    this.selector = selectorFor(this.bands, options);
    this.protocol = protocol;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  run(): EmbedResult {
    if (this._phase !== "init") throw new SessionStateError(`Embedding session already ${this._phase}`);
    try {
      return this.execute();
    } catch (err) {
      this._phase = "failed";
      throw err;
    }
  }

  private execute(): EmbedResult {
    const length = this.payload.length;
    const requested = config.headerBits + length * 8;
    const available = capacityBits(this.selector);
    if (length > this.protocol.maxPayloadBytes) {
      throw new CapacityExceededError(requested, config.headerBits + this.protocol.maxPayloadBytes * 8);
    }
    if (requested > available) throw new CapacityExceededError(requested, available);

    const bits = frameBits(this.payload);
    const cursor = this.selector.positions();
    logger.debug(`Using ${requested} coefficients from ${available} available`);

    this._phase = "header";
    this.write(take(cursor, config.headerBits), bits.slice(0, config.headerBits), this.protocol.headerStep);

    this._phase = "payload";
    const q = this.protocol.stepPolicy.stepFor(length);
    logger.debug(`Payload ${length} bytes, q=${q}`);
    this.write(take(cursor, length * 8), bits.slice(config.headerBits), q);

    this._phase = "done";
    return { bands: this.bands, length, q, bitsWritten: requested, capacityBits: available };
  }

  private write(positions: CoefficientPosition[], bits: Bit[], q: number): void {
    if (positions.length < bits.length) {
      throw new CapacityExceededError(bits.length, positions.length);
    }
    bits.forEach((bit, i) => {
      const pos = positions[i];
      const grid = bandOf(this.bands, pos);
      grid[pos.row][pos.col] = embedBit(grid[pos.row][pos.col], bit, q);
    });
  }
}

/* ============================= EXTRACT ================================ */
export class ExtractionSession {
  private _phase: SessionPhase = "init";
  private readonly bands: BandSet;
  private readonly selector: CoefficientSelector;
  private readonly protocol: StegoProtocol;

  constructor(bands: BandSet, options: CodecOptions = {}, protocol = DEFAULT_PROTOCOL) {
    this.bands = bands;
    this.selector = selectorFor(bands, options);
    this.protocol = protocol;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  run(): ExtractResult {
    if (this._phase !== "init") throw new SessionStateError(`Extraction session already ${this._phase}`);
    try {
      return this.execute();
    } catch (err) {
      this._phase = "failed";
      throw err;
    }
  }

  private execute(): ExtractResult {
    const cursor = this.selector.positions();

    this._phase = "header";
    const headerBits = this.read(take(cursor, config.headerBits), this.protocol.headerStep);
    const length = decodeLength(headerBits);
    if (length > this.protocol.maxPayloadBytes) {
      throw new CorruptHeaderError(length, this.protocol.maxPayloadBytes);
    }

    // Q depends on the decoded length only
    this._phase = "payload";
    const q = this.protocol.stepPolicy.stepFor(length);
    logger.debug(`Header says ${length} bytes, q=${q}`);
    const payloadBits = this.read(take(cursor, length * 8), q);
    const { payload } = unframe(headerBits.concat(payloadBits));

    this._phase = "done";
    return { payload, length, q };
  }

  private read(positions: CoefficientPosition[], q: number): Bit[] {
    return positions.map((pos) => extractBit(bandOf(this.bands, pos)[pos.row][pos.col], q));
  }
}

/* ------------------------------ Helpers ------------------------------ */
export function embedPayload(bands: BandSet, payload: Uint8Array, options: CodecOptions = {}): EmbedResult {
  return new EmbeddingSession(bands, payload, options).run();
}

export function extractPayload(bands: BandSet, options: CodecOptions = {}): Uint8Array {
  return new ExtractionSession(bands, options).run().payload;
}
