import { createServer } from "http";
import { loadConfig } from "./config";
import { createClock } from "./clock";
import { createDatabase, type DatabaseHandle } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./mem-storage";
import { AlertLedger } from "./alert-ledger";
import { DeviceControlService } from "./device-control-service";
import { RoboflowClient } from "./roboflow-api";
import { BlynkClient } from "./blynk-api";
import { ImageIngestionService } from "./image-ingestion";
import { InferenceOrchestrator, type InferenceJob } from "./inference-orchestrator";
import { InferenceQueue } from "./inference-queue";
import { createApp } from "./app";
import { log } from "./log";

const config = loadConfig();
const clock = createClock(config.timezone);

let database: DatabaseHandle | undefined;
let storage: IStorage;
if (config.databaseUrl) {
  database = createDatabase(config.databaseUrl);
  storage = new DatabaseStorage(database.db);
} else {
  console.warn("[Storage] DATABASE_URL not set, using in-memory storage (data is lost on restart)");
  storage = new MemStorage(clock.now);
}

const inference = new RoboflowClient({
  settings: config.roboflow,
  targetClasses: config.targetClasses,
  timeoutMs: config.inference.timeoutMs,
  maxRetries: config.inference.maxRetries,
});
if (!inference.isConfigured) {
  console.warn("[Roboflow] No workflow or model configured; every upload will record a failed inference");
}

const dashboard = new BlynkClient({
  authToken: config.blynk.authToken,
  serverUrl: config.blynk.serverUrl,
  clock,
});

const ledger = new AlertLedger({
  storage,
  clock,
  thresholds: config.thresholds,
  alertMinStatus: config.alertMinStatus,
});

const orchestrator = new InferenceOrchestrator({
  storage,
  inference,
  dashboard,
  ledger,
  clock,
  thresholds: config.thresholds,
});

const queue = new InferenceQueue<InferenceJob>((job) => orchestrator.runCycle(job), config.queue);

const app = createApp({
  storage,
  clock,
  controls: new DeviceControlService({ storage, clock }),
  ledger,
  ingestion: new ImageIngestionService({
    storage,
    clock,
    originalPath: config.storage.originalPath,
    preprocessedPath: config.storage.preprocessedPath,
    maxImageDimension: config.maxImageDimension,
  }),
  orchestrator,
  queue,
  thresholds: config.thresholds,
});

const httpServer = createServer(app);

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port} (timezone ${config.timezone})`);
});

async function shutdown(signal: string) {
  log(`${signal} received, draining inference queue`);
  httpServer.close();
  await queue.close();
  await database?.pool.end();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  });
}
