import { comparePasswords, hashPassword, verifyDevice } from "./auth";
import { MemStorage } from "./mem-storage";
import { ErrorCode } from "./error-handling";
import { createTestDevice } from "./test-fixtures";

describe("password hashing", () => {
  it("should verify the password it hashed", async () => {
    const stored = await hashPassword("test-secret");

    expect(stored).toMatch(/^[0-9a-f]{128}\.[0-9a-f]{32}$/);
    expect(await comparePasswords("test-secret", stored)).toBe(true);
    expect(await comparePasswords("other-secret", stored)).toBe(false);
  });

  it("should reject a malformed stored hash", async () => {
    expect(await comparePasswords("test-secret", "not-a-hash")).toBe(false);
  });
});

describe("verifyDevice", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it("should return the device for valid credentials", async () => {
    const device = await createTestDevice(storage, "pond-1");

    await expect(verifyDevice(storage, "pond-1", "test-secret")).resolves.toEqual(device);
  });

  it("should return undefined for a wrong password or unknown device", async () => {
    await createTestDevice(storage, "pond-1");

    await expect(verifyDevice(storage, "pond-1", "wrong-secret")).resolves.toBeUndefined();
    await expect(verifyDevice(storage, "pond-9", "test-secret")).resolves.toBeUndefined();
  });

  it("should refuse an inactive device", async () => {
    await createTestDevice(storage, "pond-1", { isActive: false });

    await expect(verifyDevice(storage, "pond-1", "test-secret")).rejects.toMatchObject({
      code: ErrorCode.FORBIDDEN,
    });
  });
});
