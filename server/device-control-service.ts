import type { ControlCommand, ControlStatus, DeviceControl, ReportableControlStatus } from "@shared/schema";
import type { DecisionAction } from "@shared/decisionEngine";
import type { ControlRecordResponse, ControlResponse } from "@shared/routes";
import type { IStorage } from "./storage";
import type { Clock } from "./clock";
import { ErrorCode, NotFoundError } from "./error-handling";

export const AUTO_CONTROL_MESSAGE = "Automatic control based on inference";
export const NO_CONTROL_MESSAGE = "No control configured for this device";

export interface ControlStatusView {
  deviceCode: string;
  command: ControlCommand | null;
  status: ControlStatus | "NOT_SET";
  message: string;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface DeviceControlServiceOptions {
  storage: IStorage;
  clock: Clock;
}

/**
 * Single-slot command mailbox per device.
 *
 *   NOT_SET --set--> PENDING --report--> EXECUTED | FAILED
 *   any     --set--> PENDING (overwrites)
 *   any     --reset--> NOT_SET
 *
 * A PENDING row overrides automatic control on poll. Reporting does not
 * consume the row; it stays until the next set or reset.
 */
export class DeviceControlService {
  private readonly storage: IStorage;
  private readonly clock: Clock;

  constructor(options: DeviceControlServiceOptions) {
    this.storage = options.storage;
    this.clock = options.clock;
  }

  getControl(deviceCode: string): Promise<DeviceControl | undefined> {
    return this.storage.getDeviceControl(deviceCode);
  }

  async setControl(deviceCode: string, command: ControlCommand, message?: string): Promise<DeviceControl> {
    const device = await this.storage.getDeviceByCode(deviceCode);
    if (!device) {
      throw new NotFoundError(ErrorCode.DEVICE_NOT_FOUND, { deviceCode });
    }

    const existing = await this.storage.getDeviceControl(deviceCode);
    const defaultMessage = existing ? `Control set to ${command}` : `Control initialized to ${command}`;

    const control = await this.storage.upsertDeviceControl({
      deviceId: device.id,
      deviceCode,
      controlCommand: command,
      status: "PENDING",
      message: message ?? defaultMessage,
      updatedAt: this.clock.now(),
    });

    console.log(`[Control] ${deviceCode} -> ${command} (PENDING)`);
    return control;
  }

  /** Records the device's execution report. Undefined when no control row exists. */
  async updateStatus(
    deviceCode: string,
    status: ReportableControlStatus,
    message?: string
  ): Promise<DeviceControl | undefined> {
    const updated = await this.storage.updateDeviceControlStatus(deviceCode, {
      status,
      message: message ?? `Status updated to ${status}`,
      updatedAt: this.clock.now(),
    });

    if (updated) {
      console.log(`[Control] ${deviceCode} reported ${status}`);
    } else {
      console.warn(`[Control] ${deviceCode} reported ${status} with no control set`);
    }
    return updated;
  }

  /**
   * What a polling device should do: the pending manual command if there is
   * one, the automatic action otherwise.
   */
  async getControlResponse(
    deviceCode: string,
    automaticAction: ControlCommand | DecisionAction
  ): Promise<ControlResponse> {
    const control = await this.storage.getDeviceControl(deviceCode);

    if (control && control.status === "PENDING") {
      return {
        mode: "MANUAL",
        command: control.controlCommand,
        status: "PENDING",
        message: control.message,
        timestamp: this.clock.format(control.updatedAt),
      };
    }

    return {
      mode: "AUTO",
      action: automaticAction,
      status: "AUTO",
      message: AUTO_CONTROL_MESSAGE,
      timestamp: this.clock.format(this.clock.now()),
    };
  }

  async getControlStatus(deviceCode: string): Promise<ControlStatusView> {
    const control = await this.storage.getDeviceControl(deviceCode);
    if (!control) {
      return {
        deviceCode,
        command: null,
        status: "NOT_SET",
        message: NO_CONTROL_MESSAGE,
        createdAt: null,
        updatedAt: null,
      };
    }

    return {
      deviceCode,
      command: control.controlCommand,
      status: control.status,
      message: control.message ?? "",
      createdAt: this.clock.format(control.createdAt),
      updatedAt: this.clock.format(control.updatedAt),
    };
  }

  async resetControl(deviceCode: string): Promise<boolean> {
    const deleted = await this.storage.deleteDeviceControl(deviceCode);
    if (deleted) {
      console.log(`[Control] ${deviceCode} reset to automatic`);
    }
    return deleted;
  }

  toRecord(control: DeviceControl): ControlRecordResponse {
    return {
      success: true,
      deviceCode: control.deviceCode,
      command: control.controlCommand,
      status: control.status,
      message: control.message,
      timestamp: this.clock.format(control.updatedAt),
    };
  }
}
