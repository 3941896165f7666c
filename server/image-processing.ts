import crypto from "crypto";
import sharp from "sharp";
import { ErrorCode, ValidationError } from "./error-handling";

const MIN_DIMENSION = 16;
const JPEG_QUALITY = 90;

export interface ImageInfo {
  width: number;
  height: number;
  format: string;
  checksum: string;
}

export interface ProcessedImage {
  buffer: Buffer;
  width: number;
  height: number;
  checksum: string;
}

export function sha256(buffer: Buffer): string {
  return crypto.createHash("sha256").update(buffer).digest("hex");
}

/**
 * Read dimensions and checksum of an uploaded frame.
 * Throws INVALID_IMAGE when sharp cannot decode it.
 */
export async function inspectImage(buffer: Buffer): Promise<ImageInfo> {
  if (buffer.length === 0) {
    throw new ValidationError(ErrorCode.INVALID_IMAGE, new Error("Empty image body"));
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(buffer).metadata();
  } catch (error) {
    throw new ValidationError(
      ErrorCode.INVALID_IMAGE,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  if (!metadata.width || !metadata.height) {
    throw new ValidationError(ErrorCode.INVALID_IMAGE, new Error("Could not read image dimensions"));
  }
  if (metadata.width < MIN_DIMENSION || metadata.height < MIN_DIMENSION) {
    throw new ValidationError(
      ErrorCode.INVALID_IMAGE,
      new Error(`Image too small: ${metadata.width}x${metadata.height} (min ${MIN_DIMENSION}x${MIN_DIMENSION})`)
    );
  }

  return {
    width: metadata.width,
    height: metadata.height,
    format: metadata.format ?? "unknown",
    checksum: sha256(buffer),
  };
}

/**
 * Normalize a frame for inference: orientation, denoise, local contrast,
 * sharpen, fit within maxDimension, RGB JPEG.
 */
export async function preprocessImage(
  buffer: Buffer,
  options: { maxDimension: number }
): Promise<ProcessedImage> {
  // sharp orders operations internally, so CLAHE needs its own pass
  // before sharpen converts the pixels away from 8-bit
  const equalized = await sharp(buffer)
    .rotate()
    .removeAlpha()
    .toColourspace("srgb")
    .median(3)
    .clahe({ width: 8, height: 8, maxSlope: 2 })
    .png()
    .toBuffer();

  const { data, info } = await sharp(equalized)
    .sharpen()
    .resize({
      width: options.maxDimension,
      height: options.maxDimension,
      fit: "inside",
      withoutEnlargement: true,
    })
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer({ resolveWithObject: true });

  return {
    buffer: data,
    width: info.width,
    height: info.height,
    checksum: sha256(data),
  };
}
