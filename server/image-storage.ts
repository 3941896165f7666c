import path from "path";
import { mkdir, writeFile } from "fs/promises";
import type { ImageType } from "@shared/schema";
import type { Clock } from "./clock";

/**
 * `<deviceCode>_<type>_<yyyyMMdd_HHmmss_SSS>_<uploadId>.jpg`, wall time in the
 * clock's timezone. The upload id keeps same-millisecond uploads apart.
 */
export function generateImageFilename(
  deviceCode: string,
  imageType: ImageType,
  clock: Clock,
  at: Date,
  uploadId: string
): string {
  const stamp = clock.formatPattern(at, "yyyyMMdd_HHmmss_SSS");
  return `${deviceCode}_${imageType}_${stamp}_${uploadId}.jpg`;
}

/** Writes a new file; fails with EEXIST rather than replacing one. */
export async function saveImageFile(directory: string, filename: string, buffer: Buffer): Promise<string> {
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, filename);
  await writeFile(filePath, buffer, { flag: "wx" });
  return filePath;
}
