import { randomUUID } from "crypto";
import {
  ALERT_TYPE_LARVA_DETECTED,
  type Device,
  type InsertDevice,
  type DeviceAuth,
  type Image,
  type InsertImage,
  type InferenceResult,
  type InsertInferenceResult,
  type Alert,
  type InsertAlert,
  type DeviceControl,
  type UpsertDeviceControl,
  type ControlStatus,
} from "@shared/schema";
import type { IStorage } from "./storage";

/**
 * In-process IStorage. Backs the test suite and local runs without
 * DATABASE_URL. Every method finishes its read-then-write without yielding,
 * so each call is atomic with respect to other callers.
 */
export class MemStorage implements IStorage {
  private devices = new Map<string, Device>();
  private auth = new Map<string, DeviceAuth>();
  private images = new Map<string, Image>();
  private inferenceResults: InferenceResult[] = [];
  private alerts: Alert[] = [];
  private controls = new Map<string, DeviceControl>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getDevice(id: string): Promise<Device | undefined> {
    return this.devices.get(id);
  }

  async getDeviceByCode(deviceCode: string): Promise<Device | undefined> {
    return Array.from(this.devices.values()).find((d) => d.deviceCode === deviceCode);
  }

  async createDevice(insertDevice: InsertDevice, passwordHash: string): Promise<Device> {
    if (await this.getDeviceByCode(insertDevice.deviceCode)) {
      throw new Error(`duplicate key value violates unique constraint "devices_device_code_unique"`);
    }
    const device: Device = {
      id: randomUUID(),
      deviceCode: insertDevice.deviceCode,
      location: insertDevice.location ?? null,
      description: insertDevice.description ?? null,
      isActive: insertDevice.isActive ?? true,
      createdAt: this.now(),
    };
    this.devices.set(device.id, device);
    this.auth.set(device.deviceCode, {
      id: randomUUID(),
      deviceId: device.id,
      deviceCode: device.deviceCode,
      passwordHash,
    });
    return device;
  }

  async setDeviceActive(deviceCode: string, isActive: boolean): Promise<Device | undefined> {
    const device = await this.getDeviceByCode(deviceCode);
    if (!device) return undefined;
    const updated = { ...device, isActive };
    this.devices.set(device.id, updated);
    return updated;
  }

  async getDeviceAuth(deviceCode: string): Promise<DeviceAuth | undefined> {
    return this.auth.get(deviceCode);
  }

  async updateDevicePassword(deviceCode: string, passwordHash: string): Promise<boolean> {
    const existing = this.auth.get(deviceCode);
    if (!existing) return false;
    this.auth.set(deviceCode, { ...existing, passwordHash });
    return true;
  }

  async createImage(image: InsertImage): Promise<Image> {
    const created: Image = {
      id: randomUUID(),
      deviceId: image.deviceId,
      deviceCode: image.deviceCode,
      imageType: image.imageType,
      imagePath: image.imagePath,
      width: image.width,
      height: image.height,
      checksum: image.checksum,
      capturedAt: image.capturedAt ?? null,
      uploadedAt: image.uploadedAt ?? this.now(),
    };
    this.images.set(created.id, created);
    return created;
  }

  async getImage(id: string): Promise<Image | undefined> {
    return this.images.get(id);
  }

  async createInferenceResult(result: InsertInferenceResult): Promise<InferenceResult> {
    const created: InferenceResult = {
      id: randomUUID(),
      imageId: result.imageId,
      deviceId: result.deviceId,
      deviceCode: result.deviceCode,
      inferenceAt: result.inferenceAt ?? this.now(),
      rawPrediction: result.rawPrediction ?? null,
      totalObjects: result.totalObjects ?? 0,
      totalTarget: result.totalTarget ?? 0,
      totalOther: result.totalOther ?? 0,
      avgConfidence: result.avgConfidence ?? 0,
      parsingVersion: result.parsingVersion ?? null,
      status: result.status,
      errorMessage: result.errorMessage ?? null,
    };
    this.inferenceResults.push(created);
    return created;
  }

  async getLatestInferenceResult(deviceCode: string): Promise<InferenceResult | undefined> {
    const [latest] = await this.getInferenceResults(deviceCode, 1);
    return latest;
  }

  async getInferenceResults(deviceCode: string, limit = 50): Promise<InferenceResult[]> {
    return this.inferenceResults
      .map((result, order) => ({ result, order }))
      .filter(({ result }) => result.deviceCode === deviceCode)
      // newest first; insertion order breaks ties
      .sort((a, b) => b.result.inferenceAt.getTime() - a.result.inferenceAt.getTime() || b.order - a.order)
      .slice(0, limit)
      .map(({ result }) => result);
  }

  async getOpenAlerts(deviceCode: string): Promise<Alert[]> {
    return this.getAlerts(deviceCode, { openOnly: true });
  }

  async getAlerts(deviceCode: string, options: { openOnly?: boolean; limit?: number } = {}): Promise<Alert[]> {
    return this.alerts
      .filter((alert) => alert.deviceCode === deviceCode && (!options.openOnly || !alert.resolved))
      .reverse()
      .slice(0, options.limit ?? 100);
  }

  async createAlertIfNoneOpen(alert: InsertAlert): Promise<Alert | undefined> {
    if (this.alerts.some((a) => a.deviceId === alert.deviceId && !a.resolved)) {
      return undefined;
    }
    const created: Alert = {
      id: randomUUID(),
      deviceId: alert.deviceId,
      deviceCode: alert.deviceCode,
      alertType: alert.alertType ?? ALERT_TYPE_LARVA_DETECTED,
      alertLevel: alert.alertLevel,
      alertMessage: alert.alertMessage ?? null,
      detectionCount: alert.detectionCount,
      resolved: false,
      createdAt: alert.createdAt ?? this.now(),
      resolvedAt: null,
    };
    this.alerts.push(created);
    return created;
  }

  async resolveOpenAlerts(deviceCode: string, resolvedAt: Date): Promise<number> {
    let count = 0;
    this.alerts = this.alerts.map((alert) => {
      if (alert.deviceCode !== deviceCode || alert.resolved) return alert;
      count++;
      return { ...alert, resolved: true, resolvedAt };
    });
    return count;
  }

  async getDeviceControl(deviceCode: string): Promise<DeviceControl | undefined> {
    return this.controls.get(deviceCode);
  }

  async upsertDeviceControl(control: UpsertDeviceControl): Promise<DeviceControl> {
    const existing = this.controls.get(control.deviceCode);
    const saved: DeviceControl = {
      id: existing?.id ?? randomUUID(),
      deviceId: control.deviceId,
      deviceCode: control.deviceCode,
      controlCommand: control.controlCommand,
      status: control.status,
      message: control.message,
      createdAt: existing?.createdAt ?? control.updatedAt,
      updatedAt: control.updatedAt,
    };
    this.controls.set(control.deviceCode, saved);
    return saved;
  }

  async updateDeviceControlStatus(
    deviceCode: string,
    update: { status: ControlStatus; message: string | null; updatedAt: Date }
  ): Promise<DeviceControl | undefined> {
    const existing = this.controls.get(deviceCode);
    if (!existing) return undefined;
    const updated = { ...existing, ...update };
    this.controls.set(deviceCode, updated);
    return updated;
  }

  async deleteDeviceControl(deviceCode: string): Promise<boolean> {
    return this.controls.delete(deviceCode);
  }
}
