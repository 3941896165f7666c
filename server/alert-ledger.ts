import {
  DEFAULT_THRESHOLDS,
  determineStatus,
  isAtLeast,
  type DecisionThresholds,
  type DetectionStatus,
} from "@shared/decisionEngine";
import { ALERT_TYPE_LARVA_DETECTED, type Alert } from "@shared/schema";
import type { IStorage } from "./storage";
import type { Clock } from "./clock";
import { KeyedMutex } from "./keyed-lock";

export interface AlertLedgerOptions {
  storage: IStorage;
  clock: Clock;
  thresholds?: DecisionThresholds;
  /** Lowest status that opens an alert */
  alertMinStatus?: DetectionStatus;
}

/**
 * Open/resolved alert bookkeeping per device. At most one open alert
 * exists per device at any time.
 */
export class AlertLedger {
  private readonly storage: IStorage;
  private readonly clock: Clock;
  private readonly thresholds: DecisionThresholds;
  private readonly alertMinStatus: DetectionStatus;
  private readonly locks = new KeyedMutex();

  constructor(options: AlertLedgerOptions) {
    this.storage = options.storage;
    this.clock = options.clock;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.alertMinStatus = options.alertMinStatus ?? "DANGER";
  }

  /** Serializes ledger work for one device. */
  withDeviceLock<T>(deviceCode: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(deviceCode, fn);
  }

  async shouldCreateAlert(deviceCode: string, targetCount: number): Promise<boolean> {
    const status = determineStatus(targetCount, this.thresholds);
    if (!isAtLeast(status, this.alertMinStatus)) return false;

    const open = await this.storage.getOpenAlerts(deviceCode);
    return open.length === 0;
  }

  /**
   * Opens an alert for the device. Returns undefined when another open alert
   * already exists (a concurrent writer won).
   */
  async createAlert(deviceId: string, deviceCode: string, targetCount: number): Promise<Alert | undefined> {
    const status = determineStatus(targetCount, this.thresholds);
    const alert = await this.storage.createAlertIfNoneOpen({
      deviceId,
      deviceCode,
      alertType: ALERT_TYPE_LARVA_DETECTED,
      alertLevel: status,
      alertMessage: `${targetCount} larvae detected on ${deviceCode} (${status})`,
      detectionCount: targetCount,
      createdAt: this.clock.now(),
    });

    if (alert) {
      console.log(`[Alerts] Opened ${status} alert for ${deviceCode} (count=${targetCount})`);
    } else {
      console.log(`[Alerts] ${deviceCode} already has an open alert, skipping`);
    }
    return alert;
  }

  /** Resolves every open alert when the count maps to SAFE. Returns how many were resolved. */
  async resolveAlertsIfSafe(deviceCode: string, targetCount: number): Promise<number> {
    if (determineStatus(targetCount, this.thresholds) !== "SAFE") return 0;

    const resolved = await this.storage.resolveOpenAlerts(deviceCode, this.clock.now());
    if (resolved > 0) {
      console.log(`[Alerts] Resolved ${resolved} alert(s) for ${deviceCode}`);
    }
    return resolved;
  }

  listAlerts(deviceCode: string, options: { openOnly?: boolean; limit?: number } = {}): Promise<Alert[]> {
    return this.storage.getAlerts(deviceCode, options);
  }
}
