import path from "path";
import { z } from "zod";
import { DEFAULT_THRESHOLDS, type DecisionThresholds, type DetectionStatus } from "@shared/decisionEngine";
import { detectionStatusSchema } from "@shared/routes";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const intWithDefault = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: intWithDefault(5000, 1),
    DATABASE_URL: optionalString,

    TIMEZONE: z.preprocess(blankToUndefined, z.string().default("Asia/Jakarta")),

    WARNING_THRESHOLD: intWithDefault(DEFAULT_THRESHOLDS.warning, 1),
    DANGER_THRESHOLD: intWithDefault(DEFAULT_THRESHOLDS.danger, 1),
    ALERT_MIN_STATUS: z.preprocess(blankToUndefined, detectionStatusSchema.default("DANGER")),
    TARGET_CLASSES: z.preprocess(blankToUndefined, z.string().default("jentik,larva,larvae")),

    ROBOFLOW_API_KEY: optionalString,
    ROBOFLOW_API_URL: z.preprocess(blankToUndefined, z.string().url().default("https://serverless.roboflow.com")),
    ROBOFLOW_WORKSPACE: optionalString,
    ROBOFLOW_WORKFLOW_ID: optionalString,
    ROBOFLOW_MODEL_ID: optionalString,
    ROBOFLOW_VERSION: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional()),
    INFERENCE_TIMEOUT_MS: intWithDefault(30000, 1),
    INFERENCE_MAX_RETRIES: intWithDefault(2),

    BLYNK_AUTH_TOKEN: optionalString,
    BLYNK_SERVER_URL: z.preprocess(blankToUndefined, z.string().url().default("https://blynk.cloud")),

    STORAGE_PATH: z.preprocess(blankToUndefined, z.string().default("./storage")),
    MAX_IMAGE_DIMENSION: intWithDefault(1024, 64),

    INFERENCE_CONCURRENCY: intWithDefault(2, 1),
    INFERENCE_QUEUE_CAPACITY: intWithDefault(100, 1),
  })
  .refine((env) => env.WARNING_THRESHOLD <= env.DANGER_THRESHOLD, {
    message: "WARNING_THRESHOLD must not exceed DANGER_THRESHOLD",
    path: ["WARNING_THRESHOLD"],
  })
  .refine((env) => isValidTimeZone(env.TIMEZONE), {
    message: "TIMEZONE must be an IANA time zone name",
    path: ["TIMEZONE"],
  });

export type RoboflowSettings =
  | { mode: "workflow"; apiKey: string; apiUrl: string; workspace: string; workflowId: string }
  | { mode: "model"; apiKey: string; modelId: string; version: number }
  | { mode: "disabled" };

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  timezone: string;
  thresholds: DecisionThresholds;
  alertMinStatus: DetectionStatus;
  targetClasses: string[];
  roboflow: RoboflowSettings;
  inference: {
    timeoutMs: number;
    maxRetries: number;
  };
  blynk: {
    authToken?: string;
    serverUrl: string;
  };
  storage: {
    rootPath: string;
    originalPath: string;
    preprocessedPath: string;
  };
  maxImageDimension: number;
  queue: {
    concurrency: number;
    capacity: number;
  };
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function parseTargetClasses(raw: string): string[] {
  return raw
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
}

/**
 * Build the application config from environment variables.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  let roboflow: RoboflowSettings = { mode: "disabled" };
  if (parsed.ROBOFLOW_API_KEY && parsed.ROBOFLOW_WORKSPACE && parsed.ROBOFLOW_WORKFLOW_ID) {
    roboflow = {
      mode: "workflow",
      apiKey: parsed.ROBOFLOW_API_KEY,
      apiUrl: parsed.ROBOFLOW_API_URL,
      workspace: parsed.ROBOFLOW_WORKSPACE,
      workflowId: parsed.ROBOFLOW_WORKFLOW_ID,
    };
  } else if (parsed.ROBOFLOW_API_KEY && parsed.ROBOFLOW_MODEL_ID && parsed.ROBOFLOW_VERSION) {
    roboflow = {
      mode: "model",
      apiKey: parsed.ROBOFLOW_API_KEY,
      modelId: parsed.ROBOFLOW_MODEL_ID,
      version: parsed.ROBOFLOW_VERSION,
    };
  }

  const rootPath = path.resolve(parsed.STORAGE_PATH);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    timezone: parsed.TIMEZONE,
    thresholds: {
      warning: parsed.WARNING_THRESHOLD,
      danger: parsed.DANGER_THRESHOLD,
    },
    alertMinStatus: parsed.ALERT_MIN_STATUS,
    targetClasses: parseTargetClasses(parsed.TARGET_CLASSES),
    roboflow,
    inference: {
      timeoutMs: parsed.INFERENCE_TIMEOUT_MS,
      maxRetries: parsed.INFERENCE_MAX_RETRIES,
    },
    blynk: {
      authToken: parsed.BLYNK_AUTH_TOKEN,
      serverUrl: parsed.BLYNK_SERVER_URL,
    },
    storage: {
      rootPath,
      originalPath: path.join(rootPath, "images", "original"),
      preprocessedPath: path.join(rootPath, "images", "preprocessed"),
    },
    maxImageDimension: parsed.MAX_IMAGE_DIMENSION,
    queue: {
      concurrency: parsed.INFERENCE_CONCURRENCY,
      capacity: parsed.INFERENCE_QUEUE_CAPACITY,
    },
  };
}
