import { DeviceControlService, AUTO_CONTROL_MESSAGE, NO_CONTROL_MESSAGE } from "./device-control-service";
import { MemStorage } from "./mem-storage";
import { createManualClock, type ManualClock } from "./clock";
import { createTestDevice, T0 } from "./test-fixtures";
import { ErrorCode, NotFoundError } from "./error-handling";

describe("DeviceControlService", () => {
  let storage: MemStorage;
  let clock: ManualClock;
  let controls: DeviceControlService;

  beforeEach(async () => {
    clock = createManualClock(T0);
    storage = new MemStorage(clock.now);
    controls = new DeviceControlService({ storage, clock });
    await createTestDevice(storage);
  });

  it("should answer AUTO when no control is set", async () => {
    const response = await controls.getControlResponse("test", "SLEEP");

    expect(response).toEqual({
      mode: "AUTO",
      action: "SLEEP",
      status: "AUTO",
      message: AUTO_CONTROL_MESSAGE,
      timestamp: "2026-01-06T03:00:00.000Z",
    });
  });

  it("should answer MANUAL with the pending command", async () => {
    await controls.setControl("test", "ACTIVATE_SERVO", "go");

    expect(await controls.getControlResponse("test", "SLEEP")).toEqual({
      mode: "MANUAL",
      command: "ACTIVATE_SERVO",
      status: "PENDING",
      message: "go",
      timestamp: "2026-01-06T03:00:00.000Z",
    });
  });

  it("should revert to AUTO once the device reports execution", async () => {
    await controls.setControl("test", "ACTIVATE_SERVO", "go");
    await controls.updateStatus("test", "EXECUTED", "done");

    const response = await controls.getControlResponse("test", "SLEEP");
    expect(response.mode).toBe("AUTO");
    expect(response).toMatchObject({ action: "SLEEP", status: "AUTO" });
  });

  it("should revert to AUTO after a FAILED report too", async () => {
    await controls.setControl("test", "STOP_SERVO");
    await controls.updateStatus("test", "FAILED");

    expect((await controls.getControlResponse("test", "ACTIVATE_SERVO")).mode).toBe("AUTO");
  });

  describe("setControl", () => {
    it("should use an initialization message for a new row", async () => {
      const control = await controls.setControl("test", "ACTIVATE_SERVO");

      expect(control.message).toBe("Control initialized to ACTIVATE_SERVO");
      expect(control.status).toBe("PENDING");
    });

    it("should overwrite the single slot on later sets", async () => {
      await controls.setControl("test", "ACTIVATE_SERVO");
      await controls.updateStatus("test", "EXECUTED");
      clock.advance(1_000);
      const control = await controls.setControl("test", "STOP_SERVO");

      expect(control).toMatchObject({
        controlCommand: "STOP_SERVO",
        status: "PENDING",
        message: "Control set to STOP_SERVO",
        updatedAt: new Date(T0.getTime() + 1_000),
      });
    });

    it("should keep one row per device under concurrent sets", async () => {
      const results = await Promise.all([
        controls.setControl("test", "ACTIVATE_SERVO", "first"),
        controls.setControl("test", "STOP_SERVO", "second"),
        controls.setControl("test", "ACTIVATE_SERVO", "third"),
        controls.setControl("test", "STOP_SERVO", "last"),
      ]);

      expect(new Set(results.map((control) => control.id)).size).toBe(1);
      expect(await storage.getDeviceControl("test")).toMatchObject({
        id: results[0].id,
        controlCommand: "STOP_SERVO",
        status: "PENDING",
        message: "last",
      });
    });

    it("should reject unknown devices", async () => {
      await expect(controls.setControl("ghost", "ACTIVATE_SERVO")).rejects.toBeInstanceOf(NotFoundError);
      await expect(controls.setControl("ghost", "ACTIVATE_SERVO")).rejects.toMatchObject({
        code: ErrorCode.DEVICE_NOT_FOUND,
      });
      expect(await storage.getDeviceControl("ghost")).toBeUndefined();
    });
  });

  describe("updateStatus", () => {
    it("should return undefined when no control exists", async () => {
      expect(await controls.updateStatus("test", "EXECUTED")).toBeUndefined();
      expect(await storage.getDeviceControl("test")).toBeUndefined();
    });

    it("should default the message to the new status", async () => {
      await controls.setControl("test", "ACTIVATE_SERVO");
      const updated = await controls.updateStatus("test", "EXECUTED");

      expect(updated?.message).toBe("Status updated to EXECUTED");
    });

    it("should only refresh message and timestamp on a repeated report", async () => {
      await controls.setControl("test", "ACTIVATE_SERVO");
      await controls.updateStatus("test", "EXECUTED", "first");
      clock.advance(2_000);
      const repeated = await controls.updateStatus("test", "EXECUTED", "second");

      expect(repeated).toMatchObject({
        controlCommand: "ACTIVATE_SERVO",
        status: "EXECUTED",
        message: "second",
        updatedAt: new Date(T0.getTime() + 2_000),
      });
    });
  });

  describe("getControlStatus", () => {
    it("should report NOT_SET without a row", async () => {
      expect(await controls.getControlStatus("test")).toEqual({
        deviceCode: "test",
        command: null,
        status: "NOT_SET",
        message: NO_CONTROL_MESSAGE,
        createdAt: null,
        updatedAt: null,
      });
    });

    it("should report the stored row", async () => {
      await controls.setControl("test", "STOP_SERVO", "halt");

      expect(await controls.getControlStatus("test")).toEqual({
        deviceCode: "test",
        command: "STOP_SERVO",
        status: "PENDING",
        message: "halt",
        createdAt: "2026-01-06T03:00:00.000Z",
        updatedAt: "2026-01-06T03:00:00.000Z",
      });
    });

    it("should keep creation time when the row is updated", async () => {
      await controls.setControl("test", "STOP_SERVO");
      clock.advance(3_000);
      await controls.updateStatus("test", "EXECUTED");

      expect(await controls.getControlStatus("test")).toMatchObject({
        status: "EXECUTED",
        createdAt: "2026-01-06T03:00:00.000Z",
        updatedAt: "2026-01-06T03:00:03.000Z",
      });
    });
  });

  describe("resetControl", () => {
    it("should delete the row and return to AUTO", async () => {
      await controls.setControl("test", "ACTIVATE_SERVO");

      expect(await controls.resetControl("test")).toBe(true);
      expect(await controls.resetControl("test")).toBe(false);
      expect((await controls.getControlResponse("test", "STOP_SERVO")).mode).toBe("AUTO");
    });
  });

  it("should render timestamps in the configured timezone", async () => {
    const jakarta = new DeviceControlService({ storage, clock: createManualClock(T0, "Asia/Jakarta") });

    const response = await jakarta.getControlResponse("test", "SLEEP");
    expect(response.timestamp).toBe("2026-01-06T10:00:00.000+07:00");
  });
});
