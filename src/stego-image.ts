import { Jimp } from "jimp";
import { PNG } from "pngjs";

import type { CapacityReport, ImageEmbedResult, ImageStegoOptions, Matrix } from "./types";
import { decompose, reconstruct } from "./dwt";
import { EmbeddingSession, ExtractionSession } from "./engine";
import { estimateCapacity } from "./capacity";
import { psnr } from "./analysis";
import { config } from "./config";
import * as logger from "./logger";

interface Raster {
  width: number;
  height: number;
  data: Buffer; // RGBA
}

/* ---------- Raster helpers ---------- */
async function readRaster(imageBuffer: Buffer): Promise<Raster> {
  const img = await Jimp.read(imageBuffer);
  const { width, height, data } = img.bitmap;
  return { width, height, data: Buffer.from(data) };
}

function encodePng({ width, height, data }: Raster): Buffer {
  const png = new PNG({ width, height });
  png.data = data;
  return PNG.sync.write(png);
}

// Top-left region whose sides are multiples of 2^levels; the rest is left as is.
function usableRegion(raster: Raster, levels: number): { rows: number; cols: number } {
  const block = 2 ** levels;
  const rows = raster.height - (raster.height % block);
  const cols = raster.width - (raster.width % block);
  if (rows !== raster.height || cols !== raster.width) {
    logger.warn(`Image ${raster.width}x${raster.height}: only the top-left ${cols}x${rows} region carries data`);
  }
  return { rows, cols };
}

function readChannel(raster: Raster, rows: number, cols: number, channel: number): Matrix {
  const mat: Matrix = [];
  for (let y = 0; y < rows; y++) {
    const row: number[] = [];
    for (let x = 0; x < cols; x++) row.push(raster.data[(y * raster.width + x) * 4 + channel]);
    mat.push(row);
  }
  return mat;
}

function writeChannel(raster: Raster, mat: Matrix, channel: number): Matrix {
  const written: Matrix = [];
  mat.forEach((values, y) => {
    const row: number[] = [];
    values.forEach((v, x) => {
      const px = Math.max(0, Math.min(255, Math.round(v)));
      raster.data[(y * raster.width + x) * 4 + channel] = px;
      row.push(px);
    });
    written.push(row);
  });
  return written;
}

/* ============================== EMBED ================================= */
/** Hides `payload` in one channel of the image; the result is always PNG. */
export async function embedInImage(
  imageBuffer: Buffer,
  payload: Uint8Array,
  options: ImageStegoOptions = {}
): Promise<ImageEmbedResult> {
  const channel = options.channel ?? config.channel;
  const levels = options.levels ?? config.levels;

  const raster = await readRaster(imageBuffer);
  const { rows, cols } = usableRegion(raster, levels);
  const cover = readChannel(raster, rows, cols, channel);

  const session = new EmbeddingSession(decompose(cover, levels), payload, options);
  const result = session.run();

  const stego = writeChannel(raster, reconstruct(result.bands, levels), channel);
  const quality = psnr(cover, stego);
  logger.debug(`Embedded ${payload.length} bytes at q=${result.q}, PSNR ${quality.toFixed(2)}dB`);

  return {
    image: encodePng(raster),
    q: result.q,
    capacityBytes: Math.floor(result.capacityBits / 8),
    psnr: quality,
  };
}

/* ============================== EXTRACT =============================== */
export async function extractFromImage(imageBuffer: Buffer, options: ImageStegoOptions = {}): Promise<Uint8Array> {
  const channel = options.channel ?? config.channel;
  const levels = options.levels ?? config.levels;

  const raster = await readRaster(imageBuffer);
  const { rows, cols } = usableRegion(raster, levels);
  const bands = decompose(readChannel(raster, rows, cols, channel), levels);
  return new ExtractionSession(bands, options).run().payload;
}

export async function imageCapacity(imageBuffer: Buffer, options: ImageStegoOptions = {}): Promise<CapacityReport> {
  const levels = options.levels ?? config.levels;
  const raster = await readRaster(imageBuffer);
  const { rows, cols } = usableRegion(raster, levels);
  return estimateCapacity(rows, cols, { ...options, levels });
}
