import type { Bit } from "./types";
import { FrameError } from "./errors";
import { bitsToU32, fromBits, toBits } from "./utils";
import { config } from "./config";

export const MAX_FRAME_LENGTH = 0xffffffff;

export interface UnframedPayload {
  length: number;
  payload: Uint8Array;
}

/** `length:u32be ++ payload`, no further encoding. */
export function frame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_FRAME_LENGTH) {
    throw new FrameError(`Payload of ${payload.length} bytes exceeds the u32 length header`);
  }
  const out = new Uint8Array(4 + payload.length);
  new DataView(out.buffer).setUint32(0, payload.length, false);
  out.set(payload, 4);
  return out;
}

export function frameBits(payload: Uint8Array): Bit[] {
  return toBits(frame(payload));
}

export function decodeLength(bits: readonly Bit[]): number {
  if (bits.length < config.headerBits) {
    throw new FrameError(`Need ${config.headerBits} header bits, have ${bits.length}`, {
      available: bits.length,
    });
  }
  return bitsToU32(bits, 0);
}

export function unframe(bits: readonly Bit[]): UnframedPayload {
  const length = decodeLength(bits);
  const needed = config.headerBits + length * 8;
  if (bits.length < needed) {
    throw new FrameError(`Frame declares ${length} bytes but only ${bits.length - config.headerBits} payload bits are present`, {
      length,
      needed,
      available: bits.length,
    });
  }
  return { length, payload: fromBits(bits.slice(config.headerBits, needed), true) };
}
