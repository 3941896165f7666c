import { BlynkClient } from "./blynk-api";
import { createManualClock } from "./clock";
import { MonitoringService } from "./monitoring";
import { T0 } from "./test-fixtures";

describe("BlynkClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should batch-update status, count and time pins", async () => {
    const fetchMock = vi.fn(async (_url: string) => new Response("", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new BlynkClient({
      authToken: "test-secret",
      serverUrl: "https://dashboard.test/",
      clock: createManualClock(T0),
      monitoringService: new MonitoringService(),
    });

    await client.updateAll("test", "DANGER", 8);

    expect(fetchMock).toHaveBeenCalledWith(
      "https://dashboard.test/external/api/batch/update?token=test-secret&V0=DANGER&V1=8&V2=2026-01-06+03%3A00%3A00"
    );
  });

  it("should send a status-only update", async () => {
    const fetchMock = vi.fn(async (_url: string) => new Response("", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new BlynkClient({
      authToken: "test-secret",
      serverUrl: "https://dashboard.test",
      clock: createManualClock(T0),
      monitoringService: new MonitoringService(),
    });

    await client.updateStatus("test", "INFERENCE ERROR");

    expect(fetchMock).toHaveBeenCalledWith(
      "https://dashboard.test/external/api/batch/update?token=test-secret&V0=INFERENCE+ERROR"
    );
  });

  it("should do nothing without a token", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const client = new BlynkClient({ serverUrl: "https://dashboard.test", clock: createManualClock(T0) });

    await client.updateAll("test", "SAFE", 0);

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should swallow HTTP and network failures and record them", async () => {
    const monitoringService = new MonitoringService();
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("bad token", { status: 400, statusText: "Bad Request" }))
      .mockRejectedValueOnce(new TypeError("fetch failed"));
    vi.stubGlobal("fetch", fetchMock);
    const client = new BlynkClient({
      authToken: "test-secret",
      serverUrl: "https://dashboard.test",
      clock: createManualClock(T0),
      monitoringService,
    });

    await expect(client.updateAll("test", "SAFE", 0)).resolves.toBeUndefined();
    await expect(client.updateStatus("test", "INFERENCE ERROR")).resolves.toBeUndefined();

    expect(monitoringService.getMetrics("blynk")).toMatchObject({ failed: 2, consecutiveFailures: 2 });
  });
});
