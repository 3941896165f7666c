import { provisionDevice, setDeviceActive } from "./device-provisioning";
import { comparePasswords } from "./auth";
import { MemStorage } from "./mem-storage";
import { ErrorCode } from "./error-handling";

describe("provisionDevice", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it("should create the device with hashed credentials", async () => {
    const { device, created } = await provisionDevice(storage, {
      deviceCode: "pond-1",
      password: "test-secret",
      location: "North pond",
    });

    expect(created).toBe(true);
    expect(device).toMatchObject({ deviceCode: "pond-1", location: "North pond", description: null, isActive: true });

    const auth = await storage.getDeviceAuth("pond-1");
    expect(auth?.deviceId).toBe(device.id);
    expect(auth?.passwordHash).not.toBe("test-secret");
    expect(await comparePasswords("test-secret", auth?.passwordHash ?? "")).toBe(true);
  });

  it("should rotate the password of an existing device", async () => {
    const first = await provisionDevice(storage, { deviceCode: "pond-1", password: "test-secret" });
    const second = await provisionDevice(storage, { deviceCode: "pond-1", password: "other-secret" });

    expect(second).toEqual({ device: first.device, created: false });
    const auth = await storage.getDeviceAuth("pond-1");
    expect(await comparePasswords("other-secret", auth?.passwordHash ?? "")).toBe(true);
    expect(await comparePasswords("test-secret", auth?.passwordHash ?? "")).toBe(false);
  });

  it("should reject device codes outside [A-Za-z0-9_-]", async () => {
    await expect(provisionDevice(storage, { deviceCode: "pond 1", password: "test-secret" })).rejects.toThrow();
    expect(await storage.getDeviceByCode("pond 1")).toBeUndefined();
  });

  it("should reject short passwords", async () => {
    await expect(provisionDevice(storage, { deviceCode: "pond-1", password: "ab" })).rejects.toMatchObject({
      code: ErrorCode.INVALID_INPUT,
    });
  });
});

describe("setDeviceActive", () => {
  it("should toggle the active flag", async () => {
    const storage = new MemStorage();
    await provisionDevice(storage, { deviceCode: "pond-1", password: "test-secret" });

    expect((await setDeviceActive(storage, "pond-1", false)).isActive).toBe(false);
    expect((await storage.getDeviceByCode("pond-1"))?.isActive).toBe(false);
  });

  it("should fail for unknown devices", async () => {
    await expect(setDeviceActive(new MemStorage(), "ghost", false)).rejects.toMatchObject({
      code: ErrorCode.DEVICE_NOT_FOUND,
    });
  });
});
