import { describe, it, expect } from "vitest";
import { UserExecutionQueue } from "./UserExecutionQueue";

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

describe("UserExecutionQueue", () => {
  it("runs operations for one user in submission order", async () => {
    const queue = new UserExecutionQueue();
    const gate = deferred();
    const order: string[] = [];

    const first = queue.run("user-a", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = queue.run("user-a", async () => {
      order.push("second");
    });

    gate.release();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("does not hold one user behind another", async () => {
    const queue = new UserExecutionQueue();
    const gate = deferred();
    const order: string[] = [];

    const slow = queue.run("user-a", async () => {
      await gate.promise;
      order.push("a");
    });
    await queue.run("user-b", async () => {
      order.push("b");
    });

    gate.release();
    await slow;

    expect(order).toEqual(["b", "a"]);
  });

  it("keeps going after a failed operation", async () => {
    const queue = new UserExecutionQueue();

    const failed = queue.run("user-a", async () => {
      throw new Error("boom");
    });
    const next = queue.run("user-a", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("forgets users once their queue drains", async () => {
    const queue = new UserExecutionQueue();

    await queue.run("user-a", async () => undefined);
    await new Promise((resolve) => setImmediate(resolve));

    expect(queue.activeUsers).toBe(0);
  });
});
