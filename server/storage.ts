import {
  devices,
  deviceAuth,
  images,
  inferenceResults,
  alerts,
  deviceControls,
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
import { eq, desc, and, sql } from "drizzle-orm";
import type { Database } from "./db";
import { withStorageErrors } from "./error-handling";
import { trackApiCall } from "./monitoring";

export interface IStorage {
  // Devices
  getDevice(id: string): Promise<Device | undefined>;
  getDeviceByCode(deviceCode: string): Promise<Device | undefined>;
  createDevice(device: InsertDevice, passwordHash: string): Promise<Device>;
  setDeviceActive(deviceCode: string, isActive: boolean): Promise<Device | undefined>;
  getDeviceAuth(deviceCode: string): Promise<DeviceAuth | undefined>;
  updateDevicePassword(deviceCode: string, passwordHash: string): Promise<boolean>;

  // Images (immutable)
  createImage(image: InsertImage): Promise<Image>;
  getImage(id: string): Promise<Image | undefined>;

  // Inference results (append-only)
  createInferenceResult(result: InsertInferenceResult): Promise<InferenceResult>;
  getLatestInferenceResult(deviceCode: string): Promise<InferenceResult | undefined>;
  getInferenceResults(deviceCode: string, limit?: number): Promise<InferenceResult[]>;

  // Alerts
  getOpenAlerts(deviceCode: string): Promise<Alert[]>;
  getAlerts(deviceCode: string, options?: { openOnly?: boolean; limit?: number }): Promise<Alert[]>;
  /** Inserts an open alert unless the device already has one; atomic per device. */
  createAlertIfNoneOpen(alert: InsertAlert): Promise<Alert | undefined>;
  resolveOpenAlerts(deviceCode: string, resolvedAt: Date): Promise<number>;

  // Device control mailbox (one row per device)
  getDeviceControl(deviceCode: string): Promise<DeviceControl | undefined>;
  upsertDeviceControl(control: UpsertDeviceControl): Promise<DeviceControl>;
  updateDeviceControlStatus(
    deviceCode: string,
    update: { status: ControlStatus; message: string | null; updatedAt: Date }
  ): Promise<DeviceControl | undefined>;
  deleteDeviceControl(deviceCode: string): Promise<boolean>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  private run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withStorageErrors(operation, () => trackApiCall("database", fn));
  }

  async getDevice(id: string): Promise<Device | undefined> {
    return this.run("getDevice", async () => {
      const [device] = await this.db.select().from(devices).where(eq(devices.id, id));
      return device;
    });
  }

  async getDeviceByCode(deviceCode: string): Promise<Device | undefined> {
    return this.run("getDeviceByCode", async () => {
      const [device] = await this.db.select().from(devices).where(eq(devices.deviceCode, deviceCode));
      return device;
    });
  }

  async createDevice(insertDevice: InsertDevice, passwordHash: string): Promise<Device> {
    return this.run("createDevice", () =>
      this.db.transaction(async (tx) => {
        const [device] = await tx.insert(devices).values(insertDevice).returning();
        await tx.insert(deviceAuth).values({
          deviceId: device.id,
          deviceCode: device.deviceCode,
          passwordHash,
        });
        return device;
      })
    );
  }

  async setDeviceActive(deviceCode: string, isActive: boolean): Promise<Device | undefined> {
    return this.run("setDeviceActive", async () => {
      const [device] = await this.db
        .update(devices)
        .set({ isActive })
        .where(eq(devices.deviceCode, deviceCode))
        .returning();
      return device;
    });
  }

  async getDeviceAuth(deviceCode: string): Promise<DeviceAuth | undefined> {
    return this.run("getDeviceAuth", async () => {
      const [auth] = await this.db.select().from(deviceAuth).where(eq(deviceAuth.deviceCode, deviceCode));
      return auth;
    });
  }

  async updateDevicePassword(deviceCode: string, passwordHash: string): Promise<boolean> {
    return this.run("updateDevicePassword", async () => {
      const updated = await this.db
        .update(deviceAuth)
        .set({ passwordHash })
        .where(eq(deviceAuth.deviceCode, deviceCode))
        .returning({ id: deviceAuth.id });
      return updated.length > 0;
    });
  }

  async createImage(image: InsertImage): Promise<Image> {
    return this.run("createImage", async () => {
      const [created] = await this.db.insert(images).values(image).returning();
      return created;
    });
  }

  async getImage(id: string): Promise<Image | undefined> {
    return this.run("getImage", async () => {
      const [image] = await this.db.select().from(images).where(eq(images.id, id));
      return image;
    });
  }

  async createInferenceResult(result: InsertInferenceResult): Promise<InferenceResult> {
    return this.run("createInferenceResult", async () => {
      const [created] = await this.db.insert(inferenceResults).values(result).returning();
      return created;
    });
  }

  async getLatestInferenceResult(deviceCode: string): Promise<InferenceResult | undefined> {
    return this.run("getLatestInferenceResult", async () => {
      const [latest] = await this.db
        .select()
        .from(inferenceResults)
        .where(eq(inferenceResults.deviceCode, deviceCode))
        .orderBy(desc(inferenceResults.inferenceAt))
        .limit(1);
      return latest;
    });
  }

  async getInferenceResults(deviceCode: string, limit = 50): Promise<InferenceResult[]> {
    return this.run("getInferenceResults", () =>
      this.db
        .select()
        .from(inferenceResults)
        .where(eq(inferenceResults.deviceCode, deviceCode))
        .orderBy(desc(inferenceResults.inferenceAt))
        .limit(limit)
    );
  }

  async getOpenAlerts(deviceCode: string): Promise<Alert[]> {
    return this.run("getOpenAlerts", () =>
      this.db
        .select()
        .from(alerts)
        .where(and(eq(alerts.deviceCode, deviceCode), eq(alerts.resolved, false)))
        .orderBy(desc(alerts.createdAt))
    );
  }

  async getAlerts(deviceCode: string, options: { openOnly?: boolean; limit?: number } = {}): Promise<Alert[]> {
    const filter = options.openOnly
      ? and(eq(alerts.deviceCode, deviceCode), eq(alerts.resolved, false))
      : eq(alerts.deviceCode, deviceCode);

    return this.run("getAlerts", () =>
      this.db
        .select()
        .from(alerts)
        .where(filter)
        .orderBy(desc(alerts.createdAt))
        .limit(options.limit ?? 100)
    );
  }

  async createAlertIfNoneOpen(alert: InsertAlert): Promise<Alert | undefined> {
    return this.run("createAlertIfNoneOpen", () =>
      this.db.transaction(async (tx) => {
        // Row lock on the device serializes concurrent inserts across processes
        await tx.execute(sql`SELECT ${devices.id} FROM ${devices} WHERE ${devices.id} = ${alert.deviceId} FOR UPDATE`);

        const [open] = await tx
          .select({ id: alerts.id })
          .from(alerts)
          .where(and(eq(alerts.deviceId, alert.deviceId), eq(alerts.resolved, false)))
          .limit(1);
        if (open) return undefined;

        const [created] = await tx
          .insert(alerts)
          .values(alert)
          .onConflictDoNothing()
          .returning();
        return created;
      })
    );
  }

  async resolveOpenAlerts(deviceCode: string, resolvedAt: Date): Promise<number> {
    return this.run("resolveOpenAlerts", async () => {
      const resolved = await this.db
        .update(alerts)
        .set({ resolved: true, resolvedAt })
        .where(and(eq(alerts.deviceCode, deviceCode), eq(alerts.resolved, false)))
        .returning({ id: alerts.id });
      return resolved.length;
    });
  }

  async getDeviceControl(deviceCode: string): Promise<DeviceControl | undefined> {
    return this.run("getDeviceControl", async () => {
      const [control] = await this.db
        .select()
        .from(deviceControls)
        .where(eq(deviceControls.deviceCode, deviceCode));
      return control;
    });
  }

  async upsertDeviceControl(control: UpsertDeviceControl): Promise<DeviceControl> {
    return this.run("upsertDeviceControl", async () => {
      const [saved] = await this.db
        .insert(deviceControls)
        .values({ ...control, createdAt: control.updatedAt })
        .onConflictDoUpdate({
          target: deviceControls.deviceId,
          set: {
            controlCommand: control.controlCommand,
            status: control.status,
            message: control.message,
            updatedAt: control.updatedAt,
          },
        })
        .returning();
      return saved;
    });
  }

  async updateDeviceControlStatus(
    deviceCode: string,
    update: { status: ControlStatus; message: string | null; updatedAt: Date }
  ): Promise<DeviceControl | undefined> {
    return this.run("updateDeviceControlStatus", async () => {
      const [updated] = await this.db
        .update(deviceControls)
        .set(update)
        .where(eq(deviceControls.deviceCode, deviceCode))
        .returning();
      return updated;
    });
  }

  async deleteDeviceControl(deviceCode: string): Promise<boolean> {
    return this.run("deleteDeviceControl", async () => {
      const deleted = await this.db
        .delete(deviceControls)
        .where(eq(deviceControls.deviceCode, deviceCode))
        .returning({ id: deviceControls.id });
      return deleted.length > 0;
    });
  }
}
