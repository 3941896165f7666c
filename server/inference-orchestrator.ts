import {
  DEFAULT_THRESHOLDS,
  clampCount,
  determineAction,
  determineStatus,
  type DecisionAction,
  type DecisionThresholds,
  type DetectionStatus,
} from "@shared/decisionEngine";
import { PARSING_VERSION, type ParsedPrediction } from "@shared/schema";
import type { IStorage } from "./storage";
import type { AlertLedger } from "./alert-ledger";
import type { Clock } from "./clock";
import type { DashboardClient } from "./blynk-api";
import type { InferenceClient, RawPrediction } from "./roboflow-api";
import { AppError, ErrorCode, toAppError } from "./error-handling";

export const INFERENCE_ERROR_STATUS = "INFERENCE ERROR";

export interface InferenceJob {
  deviceId: string;
  deviceCode: string;
  /** The preprocessed image the result refers to */
  imageId: string;
  imagePath: string;
}

export type CycleOutcome =
  | {
      ok: true;
      status: DetectionStatus;
      action: DecisionAction;
      totalTarget: number;
      alertCreated: boolean;
      alertsResolved: number;
    }
  | { ok: false; error: AppError };

export interface InferenceOrchestratorOptions {
  storage: IStorage;
  inference: InferenceClient;
  dashboard: DashboardClient;
  ledger: AlertLedger;
  clock: Clock;
  thresholds?: DecisionThresholds;
}

/**
 * Runs one upload through inference, persistence, the decision policy,
 * the alert ledger and the dashboard. Writes exactly one InferenceResult
 * per job.
 */
export class InferenceOrchestrator {
  private readonly thresholds: DecisionThresholds;

  constructor(private readonly options: InferenceOrchestratorOptions) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  }

  async runCycle(job: InferenceJob): Promise<CycleOutcome> {
    const { storage, inference, dashboard, ledger, clock } = this.options;

    let raw: RawPrediction;
    let parsed: ParsedPrediction;
    try {
      raw = await inference.infer(job.imagePath);
      parsed = inference.parsePrediction(raw);
    } catch (error) {
      const failure = toAppError(error, ErrorCode.INFERENCE_FAILED);
      console.error(`[Inference] ${job.deviceCode} image ${job.imageId} failed: ${failure.describe()}`);
      await this.recordFailure(job, failure);
      await this.notifyDashboard(job.deviceCode, () => dashboard.updateStatus(job.deviceCode, INFERENCE_ERROR_STATUS));
      return { ok: false, error: failure };
    }

    const totalTarget = clampCount(parsed.totalTarget);
    await storage.createInferenceResult({
      imageId: job.imageId,
      deviceId: job.deviceId,
      deviceCode: job.deviceCode,
      inferenceAt: clock.now(),
      rawPrediction: raw,
      totalObjects: clampCount(parsed.totalObjects),
      totalTarget,
      totalOther: clampCount(parsed.totalOther),
      avgConfidence: parsed.avgConfidence,
      parsingVersion: PARSING_VERSION,
      status: "success",
    });

    const status = determineStatus(totalTarget, this.thresholds);
    const action = determineAction(status);

    const { alertCreated, alertsResolved } = await ledger.withDeviceLock(job.deviceCode, async () => {
      let created = false;
      if (await ledger.shouldCreateAlert(job.deviceCode, totalTarget)) {
        created = (await ledger.createAlert(job.deviceId, job.deviceCode, totalTarget)) !== undefined;
      }
      const resolved = await ledger.resolveAlertsIfSafe(job.deviceCode, totalTarget);
      return { alertCreated: created, alertsResolved: resolved };
    });

    console.log(
      `[Inference] ${job.deviceCode}: ${totalTarget} target(s) of ${parsed.totalObjects} -> ${status}/${action}`
    );

    await this.notifyDashboard(job.deviceCode, () => dashboard.updateAll(job.deviceCode, status, totalTarget));

    return { ok: true, status, action, totalTarget, alertCreated, alertsResolved };
  }

  /** Records a job that never reached the provider. */
  async recordSkipped(job: InferenceJob, reason: AppError): Promise<void> {
    console.warn(`[Inference] ${job.deviceCode} image ${job.imageId} skipped: ${reason.code}`);
    await this.recordFailure(job, reason);
  }

  // Dashboard errors never undo persisted state
  private async notifyDashboard(deviceCode: string, update: () => Promise<void>): Promise<void> {
    try {
      await update();
    } catch (error) {
      console.error(`[Inference] Dashboard update failed for ${deviceCode}: ${toAppError(error).describe()}`);
    }
  }

  private async recordFailure(job: InferenceJob, error: AppError): Promise<void> {
    await this.options.storage.createInferenceResult({
      imageId: job.imageId,
      deviceId: job.deviceId,
      deviceCode: job.deviceCode,
      inferenceAt: this.options.clock.now(),
      rawPrediction: null,
      parsingVersion: PARSING_VERSION,
      status: "failed",
      errorMessage: `${error.code}: ${error.describe()}`,
    });
  }
}
