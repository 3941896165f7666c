import type { Device, ParsedPrediction } from "@shared/schema";
import type { DetectionStatus } from "@shared/decisionEngine";
import type { IStorage } from "./storage";
import { parsePrediction, type InferenceClient, type RawPrediction } from "./roboflow-api";
import type { DashboardClient } from "./blynk-api";
import { hashPassword } from "./auth";

export const TEST_PASSWORD = "test-secret";
export const T0 = new Date("2026-01-06T03:00:00.000Z");

export async function createTestDevice(
  storage: IStorage,
  deviceCode = "test",
  options: { password?: string; isActive?: boolean } = {}
): Promise<Device> {
  return storage.createDevice(
    { deviceCode, location: "Test Pond", description: null, isActive: options.isActive ?? true },
    await hashPassword(options.password ?? TEST_PASSWORD)
  );
}

export function basicAuth(deviceCode: string, password = TEST_PASSWORD): string {
  return `Basic ${Buffer.from(`${deviceCode}:${password}`).toString("base64")}`;
}

/** Hosted-model style payload with the given class names */
export function predictionPayload(classes: string[], confidence = 0.8): RawPrediction {
  return {
    predictions: classes.map((name) => ({ class: name, confidence })),
  };
}

/** Returns queued payloads (or throws queued errors) in order. */
export class FakeInferenceClient implements InferenceClient {
  readonly calls: string[] = [];
  private responses: Array<RawPrediction | Error> = [];

  respondWith(...responses: Array<RawPrediction | Error>): this {
    this.responses.push(...responses);
    return this;
  }

  async infer(imagePath: string): Promise<RawPrediction> {
    this.calls.push(imagePath);
    const next = this.responses.shift();
    if (next === undefined) throw new Error("FakeInferenceClient has no response queued");
    if (next instanceof Error) throw next;
    return next;
  }

  parsePrediction(raw: RawPrediction): ParsedPrediction {
    return parsePrediction(raw, ["larva"]);
  }
}

export class FakeDashboard implements DashboardClient {
  readonly updates: Array<{ deviceCode: string; status: DetectionStatus; targetCount: number }> = [];
  readonly statuses: Array<{ deviceCode: string; text: string }> = [];
  failWith?: Error;

  async updateAll(deviceCode: string, status: DetectionStatus, targetCount: number): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.updates.push({ deviceCode, status, targetCount });
  }

  async updateStatus(deviceCode: string, text: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.statuses.push({ deviceCode, text });
  }
}
