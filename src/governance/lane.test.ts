import { describe, expect, it } from "vitest";
import { TaskLane } from "./lane.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("TaskLane", () => {
  it("starts queued work in order as slots free up", async () => {
    const lane = new TaskLane(1);
    const order: string[] = [];
    const first = deferred();

    const a = lane.run(async () => {
      order.push("a:start");
      await first.promise;
      order.push("a:end");
      return "a";
    });
    const b = lane.run(async () => {
      order.push("b:start");
      return "b";
    });
    await Promise.resolve();
    expect(lane.active).toBe(1);
    expect(lane.queued).toBe(1);

    first.resolve();
    expect(await Promise.all([a, b])).toEqual(["a", "b"]);
    expect(order).toEqual(["a:start", "a:end", "b:start"]);
    expect(lane.active).toBe(0);
    expect(lane.queued).toBe(0);
  });

  it("releases the slot when work throws", async () => {
    const lane = new TaskLane(1);
    await expect(
      lane.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await lane.run(async () => 42)).toBe(42);
    expect(lane.active).toBe(0);
  });
});
