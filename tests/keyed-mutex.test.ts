import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/infra/keyed-mutex.js";

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("KeyedMutex", () => {
  it("runs operations on one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("pi_1", async () => {
        await delay(20);
        order.push("a");
      }),
      mutex.runExclusive("pi_1", async () => {
        order.push("b");
      }),
      mutex.runExclusive("pi_1", async () => {
        await delay(5);
        order.push("c");
      }),
    ]);

    expect(order).toEqual(["a", "b", "c"]);
    expect(mutex.size).toBe(0);
  });

  it("does not block unrelated keys", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("pi_1", async () => {
        await delay(20);
        order.push("slow");
      }),
      mutex.runExclusive("pi_2", async () => {
        order.push("fast");
      }),
    ]);

    expect(order).toEqual(["fast", "slow"]);
  });

  it("releases the key when the operation throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("pi_1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.isLocked("pi_1")).toBe(false);
    await expect(mutex.runExclusive("pi_1", async () => "next")).resolves.toBe("next");
  });
});
