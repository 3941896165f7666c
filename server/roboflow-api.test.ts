import { mkdtemp, writeFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { RoboflowClient, parsePrediction } from "./roboflow-api";
import { AppError, ErrorCode } from "./error-handling";

const TARGETS = ["jentik", "larva", "larvae"];

describe("parsePrediction", () => {
  it("should count hosted-model predictions by class", () => {
    const parsed = parsePrediction(
      {
        predictions: [
          { class: "Larva", confidence: 0.9, x: 10, y: 10 },
          { class: "jentik", confidence: 0.7 },
          { class: "pupa", confidence: 0.5 },
        ],
      },
      TARGETS
    );

    expect(parsed.totalObjects).toBe(3);
    expect(parsed.totalTarget).toBe(2);
    expect(parsed.totalOther).toBe(1);
    expect(parsed.avgConfidence).toBeCloseTo(0.7);
  });

  it("should read nested workflow outputs", () => {
    const parsed = parsePrediction(
      {
        outputs: [
          {
            predictions: {
              image: { width: 640, height: 480 },
              predictions: [
                { class: "larvae", confidence: 0.6 },
                { class: "larvae", confidence: 0.8 },
              ],
            },
          },
        ],
      },
      TARGETS
    );

    expect(parsed).toMatchObject({ totalObjects: 2, totalTarget: 2, totalOther: 0 });
    expect(parsed.avgConfidence).toBeCloseTo(0.7);
  });

  it("should accept a flat prediction list per workflow output", () => {
    const parsed = parsePrediction({ outputs: [{ predictions: [{ class: "leaf", confidence: 0.4 }] }] }, TARGETS);
    expect(parsed).toEqual({ totalObjects: 1, totalTarget: 0, totalOther: 1, avgConfidence: 0.4 });
  });

  it("should report zero confidence for an empty frame", () => {
    expect(parsePrediction({ predictions: [] }, TARGETS)).toEqual({
      totalObjects: 0,
      totalTarget: 0,
      totalOther: 0,
      avgConfidence: 0,
    });
  });

  it("should reject unknown payloads", () => {
    expect(() => parsePrediction({ result: "ok" }, TARGETS)).toThrow(AppError);
    expect(() => parsePrediction(null, TARGETS)).toThrow(AppError);
  });
});

describe("RoboflowClient", () => {
  let dir: string;
  let imagePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "roboflow-test-"));
    imagePath = path.join(dir, "frame.jpg");
    await writeFile(imagePath, Buffer.from("fake-jpeg-bytes"));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("should post base64 inputs to the workflow endpoint", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({ outputs: [] }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: {
        mode: "workflow",
        apiKey: "test-secret",
        apiUrl: "https://inference.test",
        workspace: "ponds",
        workflowId: "detect-larva",
      },
      targetClasses: TARGETS,
      timeoutMs: 1000,
      maxRetries: 0,
    });

    await expect(client.infer(imagePath)).resolves.toEqual({ outputs: [] });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://inference.test/ponds/workflows/detect-larva");
    expect(JSON.parse(String(init?.body))).toEqual({
      api_key: "test-secret",
      inputs: { image: { type: "base64", value: Buffer.from("fake-jpeg-bytes").toString("base64") } },
    });
  });

  it("should post the raw base64 body in model mode", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({ predictions: [] }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: { mode: "model", apiKey: "test-secret", modelId: "larva-detect", version: 3 },
      targetClasses: TARGETS,
      timeoutMs: 1000,
      maxRetries: 0,
    });

    await client.infer(imagePath);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://detect.roboflow.com/larva-detect/3?api_key=test-secret");
    expect(init?.body).toBe(Buffer.from("fake-jpeg-bytes").toString("base64"));
  });

  it("should abort the request when it times out", async () => {
    const fetchMock = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return reject(new Error("expected an abort signal"));
          signal.addEventListener("abort", () => reject(signal.reason));
        })
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: { mode: "model", apiKey: "test-secret", modelId: "larva-detect", version: 3 },
      targetClasses: TARGETS,
      timeoutMs: 20,
      maxRetries: 0,
    });

    await expect(client.infer(imagePath)).rejects.toMatchObject({ code: ErrorCode.INFERENCE_TIMEOUT });
    const signal = fetchMock.mock.calls[0][1]?.signal;
    await vi.waitFor(() => expect(signal?.aborted).toBe(true));
  });

  it("should retry transient server errors", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("busy", { status: 503, statusText: "Service Unavailable" }))
      .mockResolvedValueOnce(new Response(JSON.stringify({ predictions: [] }), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: { mode: "model", apiKey: "test-secret", modelId: "larva-detect", version: 3 },
      targetClasses: TARGETS,
      timeoutMs: 1000,
      maxRetries: 2,
      retryDelayMs: 1,
    });

    await expect(client.infer(imagePath)).resolves.toEqual({ predictions: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry rejected credentials", async () => {
    const fetchMock = vi.fn(async () => new Response("nope", { status: 401, statusText: "Unauthorized" }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: { mode: "model", apiKey: "test-secret", modelId: "larva-detect", version: 3 },
      targetClasses: TARGETS,
      timeoutMs: 1000,
      maxRetries: 2,
      retryDelayMs: 1,
    });

    await expect(client.infer(imagePath)).rejects.toMatchObject({ code: ErrorCode.INFERENCE_NOT_CONFIGURED });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should fail fast when no deployment is configured", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const client = new RoboflowClient({
      settings: { mode: "disabled" },
      targetClasses: TARGETS,
      timeoutMs: 1000,
      maxRetries: 2,
    });

    expect(client.isConfigured).toBe(false);
    await expect(client.infer(imagePath)).rejects.toMatchObject({ code: ErrorCode.INFERENCE_NOT_CONFIGURED });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
