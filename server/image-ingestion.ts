import { randomUUID } from "crypto";
import type { Device, Image } from "@shared/schema";
import type { IStorage } from "./storage";
import type { Clock } from "./clock";
import { inspectImage, preprocessImage } from "./image-processing";
import { generateImageFilename, saveImageFile } from "./image-storage";

export interface ImageIngestionOptions {
  storage: IStorage;
  clock: Clock;
  originalPath: string;
  preprocessedPath: string;
  maxImageDimension: number;
}

export interface IngestedUpload {
  original: Image;
  preprocessed: Image;
}

/**
 * Stores an uploaded frame twice: as received, and normalized for
 * inference. Both files are written before either row is created.
 */
export class ImageIngestionService {
  constructor(private readonly options: ImageIngestionOptions) {}

  async ingest(device: Device, buffer: Buffer, capturedAt?: Date): Promise<IngestedUpload> {
    const { storage, clock } = this.options;
    const info = await inspectImage(buffer);
    const receivedAt = clock.now();
    const uploadId = randomUUID().slice(0, 8);

    const originalFile = await saveImageFile(
      this.options.originalPath,
      generateImageFilename(device.deviceCode, "original", clock, receivedAt, uploadId),
      buffer
    );

    const processed = await preprocessImage(buffer, { maxDimension: this.options.maxImageDimension });
    const preprocessedFile = await saveImageFile(
      this.options.preprocessedPath,
      generateImageFilename(device.deviceCode, "preprocessed", clock, receivedAt, uploadId),
      processed.buffer
    );

    const original = await storage.createImage({
      deviceId: device.id,
      deviceCode: device.deviceCode,
      imageType: "original",
      imagePath: originalFile,
      width: info.width,
      height: info.height,
      checksum: info.checksum,
      capturedAt: capturedAt ?? null,
      uploadedAt: receivedAt,
    });

    const preprocessed = await storage.createImage({
      deviceId: device.id,
      deviceCode: device.deviceCode,
      imageType: "preprocessed",
      imagePath: preprocessedFile,
      width: processed.width,
      height: processed.height,
      checksum: processed.checksum,
      capturedAt: capturedAt ?? null,
      uploadedAt: receivedAt,
    });

    console.log(
      `[Upload] ${device.deviceCode}: ${info.width}x${info.height} ${info.format} -> ${processed.width}x${processed.height} jpeg`
    );
    return { original, preprocessed };
  }
}
