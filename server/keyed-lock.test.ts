import { KeyedMutex } from "./keyed-lock";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("KeyedMutex", () => {
  it("should run work for the same key one at a time in order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.runExclusive("dev-1", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task("a"), task("b"), task("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("should let different keys run concurrently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all(
      ["dev-1", "dev-2"].map((key) =>
        mutex.runExclusive(key, async () => {
          events.push(`${key}:start`);
          await tick();
          events.push(`${key}:end`);
        })
      )
    );

    expect(events.slice(0, 2)).toEqual(["dev-1:start", "dev-2:start"]);
  });

  it("should release the key when the work throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("dev-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("dev-1", async () => "next")).resolves.toBe("next");
    expect(mutex.activeKeys).toBe(0);
  });
});
