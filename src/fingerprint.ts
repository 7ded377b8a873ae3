import sharp from "sharp";
import zlib from "node:zlib";
import { scopedLogger } from "./logger.js";
import { errorMessage } from "./errors.js";
import type { CaptureError, Sample, TargetClass } from "./types.js";
import { sha256 } from "./utils.js";

const log = scopedLogger("fingerprint");

const HASH_WIDTH = 8;
const HASH_HEIGHT = 8;

/** Hash of a uniform (or undecodable) image: every gradient bit is zero. */
export const BLANK_SCREENSHOT_HASH = encodeHash(Buffer.alloc((HASH_WIDTH * HASH_HEIGHT) / 8));

function encodeHash(bits: Buffer): string {
  return bits.toString("base64").replace(/=+$/, "");
}

export function compressedSize(text: string): number {
  return zlib.deflateSync(Buffer.from(text, "utf8"), { level: zlib.constants.Z_BEST_COMPRESSION }).length;
}

/**
 * Difference hash: the image is reduced to a (w+1)×h greyscale grid and each
 * bit records whether a cell is darker than its right-hand neighbour.
 */
export async function perceptualHash(image: Buffer): Promise<string> {
  if (image.length === 0) return BLANK_SCREENSHOT_HASH;

  let data: Buffer;
  let channels: number;
  try {
    const result = await sharp(image)
      .greyscale()
      .resize(HASH_WIDTH + 1, HASH_HEIGHT, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    data = result.data;
    channels = result.info.channels;
  } catch (err) {
    log.warn({ err: errorMessage(err) }, "Screenshot could not be decoded");
    return BLANK_SCREENSHOT_HASH;
  }

  const bits = Buffer.alloc((HASH_WIDTH * HASH_HEIGHT) / 8);
  const pixel = (x: number, y: number) => data[(y * (HASH_WIDTH + 1) + x) * channels] ?? 0;
  let bit = 0;
  for (let y = 0; y < HASH_HEIGHT; y++) {
    for (let x = 0; x < HASH_WIDTH; x++) {
      if (pixel(x, y) < pixel(x + 1, y)) {
        const byte = bit >> 3;
        bits[byte] = (bits[byte] ?? 0) | (0x80 >> (bit & 7));
      }
      bit++;
    }
  }
  return encodeHash(bits);
}

function popcount(n: number): number {
  let c = 0;
  for (let v = n; v; v &= v - 1) c++;
  return c;
}

/** Number of differing bits between two perceptual hashes. */
export function hashDistance(a: string, b: string): number {
  const left = Buffer.from(a, "base64");
  const right = Buffer.from(b, "base64");
  const len = Math.max(left.length, right.length);
  let distance = 0;
  for (let i = 0; i < len; i++) {
    distance += popcount((left[i] ?? 0) ^ (right[i] ?? 0));
  }
  return distance;
}

export interface SampleInput {
  text: string;
  image?: Buffer;
  title?: string;
  targetClass: TargetClass;
  error?: CaptureError;
  now?: Date;
}

export async function buildSample(input: SampleInput): Promise<Sample> {
  const sample: Sample = {
    digest: sha256(input.text),
    compressedSize: compressedSize(input.text),
    targetClass: input.targetClass,
    capturedAt: (input.now ?? new Date()).toISOString(),
  };
  if (input.image) sample.screenshotHash = await perceptualHash(input.image);
  if (input.title !== undefined) sample.title = input.title;
  if (input.error) sample.error = input.error;
  return sample;
}
