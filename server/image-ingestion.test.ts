import sharp from "sharp";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { ImageIngestionService } from "./image-ingestion";
import { MemStorage } from "./mem-storage";
import { createManualClock } from "./clock";
import { sha256 } from "./image-processing";
import { T0, createTestDevice } from "./test-fixtures";

function solidPng(r: number, g: number, b: number): Promise<Buffer> {
  return sharp({ create: { width: 32, height: 32, channels: 3, background: { r, g, b } } })
    .png()
    .toBuffer();
}

describe("ImageIngestionService", () => {
  let dir: string;
  let storage: MemStorage;
  let ingestion: ImageIngestionService;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "larva-ingest-"));
    const clock = createManualClock(T0);
    storage = new MemStorage(clock.now);
    ingestion = new ImageIngestionService({
      storage,
      clock,
      originalPath: path.join(dir, "original"),
      preprocessedPath: path.join(dir, "preprocessed"),
      maxImageDimension: 1024,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should store the original and preprocessed frames", async () => {
    const device = await createTestDevice(storage);
    const frame = await solidPng(10, 200, 30);
    const capturedAt = new Date("2026-01-06T02:59:58.000Z");

    const { original, preprocessed } = await ingestion.ingest(device, frame, capturedAt);

    expect(original).toMatchObject({ imageType: "original", width: 32, height: 32, checksum: sha256(frame), capturedAt });
    expect(preprocessed).toMatchObject({ imageType: "preprocessed", width: 32, height: 32, uploadedAt: T0 });
    expect(await readFile(original.imagePath)).toEqual(frame);
    expect(sha256(await readFile(preprocessed.imagePath))).toBe(preprocessed.checksum);
  });

  it("should keep two uploads in the same millisecond apart", async () => {
    const device = await createTestDevice(storage);
    const frameA = await solidPng(255, 0, 0);
    const frameB = await solidPng(0, 0, 255);

    const first = await ingestion.ingest(device, frameA);
    const second = await ingestion.ingest(device, frameB);

    expect(first.original.imagePath).not.toBe(second.original.imagePath);
    expect(first.preprocessed.imagePath).not.toBe(second.preprocessed.imagePath);
    expect(await readFile(first.original.imagePath)).toEqual(frameA);
    expect(await readFile(second.original.imagePath)).toEqual(frameB);
  });
});
