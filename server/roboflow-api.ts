/**
 * Roboflow inference integration
 *
 * Two deployment styles are supported:
 * - Workflow: POST {api_key, inputs: {image: {type: "base64", value}}}
 *   to {apiUrl}/{workspace}/workflows/{workflowId}
 * - Hosted model: POST the base64 body to
 *   https://detect.roboflow.com/{model}/{version}?api_key=...
 *
 * Docs: https://docs.roboflow.com/deploy/serverless-hosted-api-v2
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { ParsedPrediction } from "@shared/schema";
import type { RoboflowSettings } from "./config";
import { ErrorCode, InferenceFailure } from "./error-handling";
import { callWithRetry, withTimeout } from "./retry-strategy";
import { trackApiCall } from "./monitoring";

const ROBOFLOW_DETECT_BASE = "https://detect.roboflow.com";

export type RawPrediction = unknown;

export interface InferenceClient {
  infer(imagePath: string): Promise<RawPrediction>;
  parsePrediction(raw: RawPrediction): ParsedPrediction;
}

const predictionSchema = z.object({
  class: z.string(),
  confidence: z.number(),
});

const predictionListSchema = z.array(predictionSchema);

// Hosted model: { predictions: [...] }
const modelResponseSchema = z.object({
  predictions: predictionListSchema,
});

// Workflow: { outputs: [{ predictions: { predictions: [...] } }] } or a flat list per output
const workflowResponseSchema = z.object({
  outputs: z.array(
    z.object({
      predictions: z.union([predictionListSchema, z.object({ predictions: predictionListSchema })]),
    })
  ),
});

type Prediction = z.infer<typeof predictionSchema>;

function extractPredictions(raw: RawPrediction): Prediction[] | undefined {
  const model = modelResponseSchema.safeParse(raw);
  if (model.success) return model.data.predictions;

  const workflow = workflowResponseSchema.safeParse(raw);
  if (workflow.success) {
    return workflow.data.outputs.flatMap((output) =>
      Array.isArray(output.predictions) ? output.predictions : output.predictions.predictions
    );
  }
  return undefined;
}

/**
 * Count target vs other detections. Class names compare case-insensitively.
 */
export function parsePrediction(raw: RawPrediction, targetClasses: readonly string[]): ParsedPrediction {
  const predictions = extractPredictions(raw);
  if (!predictions) {
    throw new InferenceFailure(
      ErrorCode.PREDICTION_PARSE_FAILED,
      new Error("Unrecognized prediction payload")
    );
  }

  const targets = new Set(targetClasses.map((name) => name.toLowerCase()));
  const totalTarget = predictions.filter((p) => targets.has(p.class.toLowerCase())).length;
  const confidenceSum = predictions.reduce((sum, p) => sum + p.confidence, 0);

  return {
    totalObjects: predictions.length,
    totalTarget,
    totalOther: predictions.length - totalTarget,
    avgConfidence: predictions.length > 0 ? confidenceSum / predictions.length : 0,
  };
}

function codeForStatus(status: number): ErrorCode {
  if (status === 429) return ErrorCode.INFERENCE_RATE_LIMIT;
  if (status === 504 || status === 408) return ErrorCode.INFERENCE_TIMEOUT;
  if (status === 401 || status === 403) return ErrorCode.INFERENCE_NOT_CONFIGURED;
  return ErrorCode.INFERENCE_FAILED;
}

export interface RoboflowClientOptions {
  settings: RoboflowSettings;
  targetClasses: readonly string[];
  timeoutMs: number;
  maxRetries: number;
  /** Base delay between retries */
  retryDelayMs?: number;
}

export class RoboflowClient implements InferenceClient {
  constructor(private readonly options: RoboflowClientOptions) {}

  get isConfigured(): boolean {
    return this.options.settings.mode !== "disabled";
  }

  async infer(imagePath: string): Promise<RawPrediction> {
    const settings = this.options.settings;
    if (settings.mode === "disabled") {
      throw new InferenceFailure(ErrorCode.INFERENCE_NOT_CONFIGURED);
    }

    const image = (await readFile(imagePath)).toString("base64");

    return trackApiCall("roboflow", () =>
      callWithRetry(
        "Roboflow",
        () => {
          // abort the request itself, not just the wait for it
          const signal = AbortSignal.timeout(this.options.timeoutMs);
          return withTimeout(this.post(settings, image, signal), this.options.timeoutMs);
        },
        {
          maxRetries: this.options.maxRetries,
          initialDelayMs: this.options.retryDelayMs ?? 1000,
          defaultErrorCode: ErrorCode.INFERENCE_FAILED,
        }
      )
    );
  }

  parsePrediction(raw: RawPrediction): ParsedPrediction {
    return parsePrediction(raw, this.options.targetClasses);
  }

  private async post(
    settings: Exclude<RoboflowSettings, { mode: "disabled" }>,
    image: string,
    signal: AbortSignal
  ): Promise<RawPrediction> {
    let response: Response;
    if (settings.mode === "workflow") {
      response = await fetch(`${settings.apiUrl}/${settings.workspace}/workflows/${settings.workflowId}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          api_key: settings.apiKey,
          inputs: { image: { type: "base64", value: image } },
        }),
        signal,
      });
    } else {
      const url = `${ROBOFLOW_DETECT_BASE}/${settings.modelId}/${settings.version}?api_key=${encodeURIComponent(settings.apiKey)}`;
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: image,
        signal,
      });
    }

    if (!response.ok) {
      throw new InferenceFailure(
        codeForStatus(response.status),
        new Error(`Roboflow API error: ${response.status} ${response.statusText}`)
      );
    }

    return response.json();
  }
}
