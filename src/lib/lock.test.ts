import { describe, expect, it } from "vitest";
import { BatchLock } from "./lock";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("BatchLock", () => {
  it("runs one batch at a time in call order", async () => {
    const lock = new BatchLock();
    const order: string[] = [];
    let releaseFirst = () => {};

    const first = lock.run(async () => {
      order.push("first:start");
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      order.push("first:end");
      return 1;
    });
    const second = lock.run(async () => {
      order.push("second");
      return 2;
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    expect(lock.pending).toBe(2);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.pending).toBe(0);
  });

  it("keeps going after a failed batch", async () => {
    const lock = new BatchLock();
    const failed = lock.run(async () => {
      throw new Error("boom");
    });
    const next = lock.run(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
