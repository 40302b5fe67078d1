import { describe, expect, test } from "vitest";

import { tick } from "../../__tests__/fakes.js";
import { createCommandLock } from "../lock.js";

describe("createCommandLock", () => {
  test("runs tasks in submission order without overlap", async () => {
    // Arrange
    const lock = createCommandLock();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`start:${name}`);
      await tick();
      events.push(`end:${name}`);
      return name;
    };

    // Act
    const results = await Promise.all([
      lock.run(task("a")),
      lock.run(task("b")),
      lock.run(task("c")),
    ]);

    // Assert
    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual([
      "start:a",
      "end:a",
      "start:b",
      "end:b",
      "start:c",
      "end:c",
    ]);
  });

  test("keeps serving after a task rejects", async () => {
    const lock = createCommandLock();

    const failed = lock.run(async () => {
      throw new Error("boom");
    });
    const next = lock.run(async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });

  test("holds later tasks until the running one settles", async () => {
    // Arrange
    const lock = createCommandLock();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let secondStarted = false;

    // Act
    const first = lock.run(() => gate);
    const second = lock.run(async () => {
      secondStarted = true;
    });
    await tick();

    // Assert
    expect(secondStarted).toBe(false);
    release();
    await Promise.all([first, second]);
    expect(secondStarted).toBe(true);
  });
});
