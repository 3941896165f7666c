import { insertDeviceSchema, type Device } from "@shared/schema";
import type { IStorage } from "./storage";
import { hashPassword } from "./auth";
import { ErrorCode, NotFoundError, ValidationError } from "./error-handling";

export const MIN_PASSWORD_LENGTH = 3;

export interface ProvisionInput {
  deviceCode: string;
  password: string;
  location?: string;
  description?: string;
}

export interface ProvisionResult {
  device: Device;
  created: boolean;
}

/**
 * Registers a device with its credentials, or rotates the password of an
 * existing one. Location and description are only applied on creation.
 */
export async function provisionDevice(storage: IStorage, input: ProvisionInput): Promise<ProvisionResult> {
  const device = insertDeviceSchema.parse({
    deviceCode: input.deviceCode,
    location: input.location ?? null,
    description: input.description ?? null,
    isActive: true,
  });
  if (input.password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, new Error(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`), {
      field: "password",
    });
  }

  const passwordHash = await hashPassword(input.password);
  const existing = await storage.getDeviceByCode(device.deviceCode);
  if (existing) {
    await storage.updateDevicePassword(existing.deviceCode, passwordHash);
    return { device: existing, created: false };
  }

  return { device: await storage.createDevice(device, passwordHash), created: true };
}

export async function setDeviceActive(storage: IStorage, deviceCode: string, isActive: boolean): Promise<Device> {
  const device = await storage.setDeviceActive(deviceCode, isActive);
  if (!device) {
    throw new NotFoundError(ErrorCode.DEVICE_NOT_FOUND, { deviceCode });
  }
  return device;
}
