/**
 * Blynk dashboard integration
 *
 * Virtual pins: V0 status text, V1 larva count, V2 last update time.
 * Docs: https://docs.blynk.io/en/blynk.cloud/https-api-overview
 */

import type { DetectionStatus } from "@shared/decisionEngine";
import type { Clock } from "./clock";
import { AppError, ErrorCode } from "./error-handling";
import { trackApiCall, type MonitoringService, monitoring } from "./monitoring";

export interface DashboardClient {
  updateAll(deviceCode: string, status: DetectionStatus, targetCount: number): Promise<void>;
  updateStatus(deviceCode: string, text: string): Promise<void>;
}

export interface BlynkClientOptions {
  authToken?: string;
  serverUrl: string;
  clock: Clock;
  monitoringService?: MonitoringService;
}

export class BlynkClient implements DashboardClient {
  constructor(private readonly options: BlynkClientOptions) {}

  async updateAll(deviceCode: string, status: DetectionStatus, targetCount: number): Promise<void> {
    const time = this.options.clock.formatPattern(this.options.clock.now(), "yyyy-MM-dd HH:mm:ss");
    await this.send(deviceCode, { V0: status, V1: String(targetCount), V2: time });
  }

  async updateStatus(deviceCode: string, text: string): Promise<void> {
    await this.send(deviceCode, { V0: text });
  }

  buildUrl(pins: Record<string, string>): string {
    const params = new URLSearchParams({ token: this.options.authToken ?? "", ...pins });
    return `${this.options.serverUrl.replace(/\/+$/, "")}/external/api/batch/update?${params.toString()}`;
  }

  // Never rejects: the dashboard is best-effort
  private async send(deviceCode: string, pins: Record<string, string>): Promise<void> {
    if (!this.options.authToken) {
      console.log(`[Blynk] No auth token configured, skipping update for ${deviceCode}`);
      return;
    }

    const url = this.buildUrl(pins);
    try {
      await trackApiCall(
        "blynk",
        async () => {
          const response = await fetch(url);
          if (!response.ok) {
            throw new AppError(
              ErrorCode.DASHBOARD_UNAVAILABLE,
              new Error(`Blynk API error: ${response.status} ${response.statusText}`)
            );
          }
        },
        this.options.monitoringService ?? monitoring
      );
    } catch (error) {
      const message = error instanceof AppError ? error.describe() : String(error);
      console.error(`[Blynk] Update failed for ${deviceCode}: ${message}`);
    }
  }
}
