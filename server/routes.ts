import type { Express, Request, Response } from "express";
import express from "express";
import { api } from "@shared/routes";
import {
  DEFAULT_AUTOMATIC_COMMAND,
  decide,
  toServoCommand,
  type DecisionThresholds,
} from "@shared/decisionEngine";
import type { ControlCommand, InferenceResult, Alert } from "@shared/schema";
import type { IStorage } from "./storage";
import type { Clock } from "./clock";
import type { DeviceControlService } from "./device-control-service";
import type { AlertLedger } from "./alert-ledger";
import type { ImageIngestionService } from "./image-ingestion";
import type { InferenceOrchestrator, InferenceJob } from "./inference-orchestrator";
import type { InferenceQueue } from "./inference-queue";
import { requireDevice, requireSameDevice, authenticatedDevice } from "./auth";
import { AppError, ErrorCode, NotFoundError, ValidationError, toAppError } from "./error-handling";
import { monitoring as defaultMonitoring, type MonitoringService } from "./monitoring";

export const UPLOAD_LIMIT = "10mb";
export const UPLOAD_ACCEPTED_MESSAGE = "Image uploaded successfully, processing in background";

export interface RouteDependencies {
  storage: IStorage;
  clock: Clock;
  controls: DeviceControlService;
  ledger: AlertLedger;
  ingestion: ImageIngestionService;
  orchestrator: InferenceOrchestrator;
  queue: InferenceQueue<InferenceJob>;
  thresholds: DecisionThresholds;
  monitoring?: MonitoringService;
}

function handleError(res: Response, error: unknown, source: string) {
  const appError = toAppError(error);
  if (appError.getStatusCode() >= 500) {
    console.error(`[${source}] ${appError.code}: ${appError.describe()}`);
  }
  res.status(appError.getStatusCode()).json(appError.toJSON());
}

function parseCapturedAt(value: unknown): Date | undefined {
  if (value === undefined || value === "") return undefined;
  const date = typeof value === "string" ? new Date(value) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, new Error("capturedAt is not a valid date"), {
      field: "capturedAt",
    });
  }
  return date;
}

function readUpload(req: Request): { buffer: Buffer; capturedAt?: Date } {
  if (Buffer.isBuffer(req.body)) {
    return { buffer: req.body, capturedAt: parseCapturedAt(req.get("X-Captured-At")) };
  }

  const input = api.device.upload.input.parse(req.body ?? {});
  return {
    buffer: Buffer.from(input.image, "base64"),
    capturedAt: parseCapturedAt(input.capturedAt),
  };
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  const { storage, clock, controls, ledger, ingestion, orchestrator, queue } = deps;
  const monitoring = deps.monitoring ?? defaultMonitoring;
  const authenticate = requireDevice(storage);
  const sameDevice = [authenticate, requireSameDevice];

  const renderResult = (result: InferenceResult) => ({
    ...result,
    inferenceAt: clock.format(result.inferenceAt),
  });

  const renderAlert = (alert: Alert) => ({
    ...alert,
    createdAt: clock.format(alert.createdAt),
    resolvedAt: alert.resolvedAt ? clock.format(alert.resolvedAt) : null,
  });

  // Servo command implied by the most recent successful inference
  const automaticCommand = async (deviceCode: string): Promise<ControlCommand> => {
    const latest = await storage.getLatestInferenceResult(deviceCode);
    if (!latest || latest.status !== "success") return DEFAULT_AUTOMATIC_COMMAND;
    return toServoCommand(decide(latest.totalTarget, deps.thresholds).action);
  };

  app.get(api.health.path, (_req, res) => {
    res.json({ status: "healthy", timestamp: clock.format(clock.now()) });
  });

  app.get(api.metrics.path, (_req, res) => {
    res.json({
      apis: monitoring.getAllMetrics(),
      health: monitoring.getHealthStatus(),
      queue: queue.stats(),
      timestamp: clock.format(clock.now()),
    });
  });

  app.get(api.device.info.path, authenticate, (req, res) => {
    try {
      const device = authenticatedDevice(req);
      res.json({
        id: device.id,
        deviceCode: device.deviceCode,
        location: device.location,
        description: device.description,
        isActive: device.isActive,
        createdAt: clock.format(device.createdAt),
      });
    } catch (error) {
      handleError(res, error, "Device");
    }
  });

  app.post(
    api.device.upload.path,
    authenticate,
    express.raw({ type: "image/*", limit: UPLOAD_LIMIT }),
    async (req, res) => {
      try {
        const device = authenticatedDevice(req);
        const { buffer, capturedAt } = readUpload(req);
        const { preprocessed } = await ingestion.ingest(device, buffer, capturedAt);

        const job: InferenceJob = {
          deviceId: device.id,
          deviceCode: device.deviceCode,
          imageId: preprocessed.id,
          imagePath: preprocessed.imagePath,
        };
        if (!queue.enqueue(job)) {
          await orchestrator.recordSkipped(job, new AppError(ErrorCode.QUEUE_FULL));
        }

        res.status(202).json({
          success: true,
          message: UPLOAD_ACCEPTED_MESSAGE,
          action: "SLEEP",
          status: "PROCESSING",
          deviceCode: device.deviceCode,
          imageId: preprocessed.id,
          totalTarget: 0,
          totalObjects: 0,
        });
      } catch (error) {
        handleError(res, error, "Upload");
      }
    }
  );

  app.get(api.device.latestInference.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const latest = await storage.getLatestInferenceResult(req.params.deviceCode);
      if (!latest) {
        throw new NotFoundError(ErrorCode.RESULT_NOT_FOUND);
      }
      res.json(renderResult(latest));
    } catch (error) {
      handleError(res, error, "Inference");
    }
  });

  app.get(api.device.alerts.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const { open } = api.device.alerts.input.parse(req.query);
      const alerts = await ledger.listAlerts(req.params.deviceCode, { openOnly: open === "true" });
      res.json(alerts.map(renderAlert));
    } catch (error) {
      handleError(res, error, "Alerts");
    }
  });

  // Device control mailbox

  app.get(api.control.poll.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const deviceCode = req.params.deviceCode;
      res.json(await controls.getControlResponse(deviceCode, await automaticCommand(deviceCode)));
    } catch (error) {
      handleError(res, error, "Control");
    }
  });

  app.post(api.control.set.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const { command, message } = api.control.set.input.parse(req.body ?? {});
      const control = await controls.setControl(req.params.deviceCode, command, message);
      res.json(controls.toRecord(control));
    } catch (error) {
      handleError(res, error, "Control");
    }
  });

  const commandAlias = (command: ControlCommand, defaultMessage: string) =>
    async (req: Request, res: Response) => {
      try {
        const { message } = api.control.activateServo.input.parse(req.body ?? {});
        const control = await controls.setControl(req.params.deviceCode, command, message ?? defaultMessage);
        res.json(controls.toRecord(control));
      } catch (error) {
        handleError(res, error, "Control");
      }
    };

  app.post(api.control.activateServo.path, sameDevice, commandAlias("ACTIVATE_SERVO", "Servo activation requested"));
  app.post(api.control.stopServo.path, sameDevice, commandAlias("STOP_SERVO", "Servo stop requested"));

  app.post(api.control.report.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const { status, message } = api.control.report.input.parse(req.body ?? {});
      const control = await controls.updateStatus(req.params.deviceCode, status, message);
      if (!control) {
        throw new NotFoundError(ErrorCode.CONTROL_NOT_FOUND);
      }
      res.json(controls.toRecord(control));
    } catch (error) {
      handleError(res, error, "Control");
    }
  });

  const reportAlias = (status: "EXECUTED" | "FAILED", defaultMessage: string) =>
    async (req: Request, res: Response) => {
      try {
        const { message } = api.control.executed.input.parse(req.body ?? {});
        const control = await controls.updateStatus(req.params.deviceCode, status, message ?? defaultMessage);
        if (!control) {
          throw new NotFoundError(ErrorCode.CONTROL_NOT_FOUND);
        }
        res.json(controls.toRecord(control));
      } catch (error) {
        handleError(res, error, "Control");
      }
    };

  app.post(api.control.executed.path, sameDevice, reportAlias("EXECUTED", "Command executed successfully"));
  app.post(api.control.failed.path, sameDevice, reportAlias("FAILED", "Command execution failed"));

  app.get(api.control.status.path, sameDevice, async (req: Request, res: Response) => {
    try {
      res.json(await controls.getControlStatus(req.params.deviceCode));
    } catch (error) {
      handleError(res, error, "Control");
    }
  });

  app.delete(api.control.reset.path, sameDevice, async (req: Request, res: Response) => {
    try {
      const deleted = await controls.resetControl(req.params.deviceCode);
      res.json({ success: true, deleted });
    } catch (error) {
      handleError(res, error, "Control");
    }
  });
}
