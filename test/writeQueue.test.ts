import { describe, expect, it } from "vitest";
import { KeyedWriteQueue } from "../src/storage/writeQueue.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedWriteQueue", () => {
  it("runs tasks on the same key one after another", async () => {
    const queue = new KeyedWriteQueue();
    const order: string[] = [];

    const first = queue.run("exp", async () => {
      order.push("first:start");
      await delay(20);
      order.push("first:end");
      return 1;
    });
    const second = queue.run("exp", async () => {
      order.push("second:start");
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("keeps going after a failed task and reports the failure only to its caller", async () => {
    const queue = new KeyedWriteQueue();
    const failing = queue.run("exp", async () => {
      throw new Error("disk full");
    });
    const next = queue.run("exp", async () => "written");

    await expect(failing).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("written");
  });

  it("does not block other keys", async () => {
    const queue = new KeyedWriteQueue();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = queue.run("exp-a", async () => {
      await gate;
      return "a";
    });
    await expect(queue.run("exp-b", async () => "b")).resolves.toBe("b");

    release();
    await expect(blocked).resolves.toBe("a");
  });
});
