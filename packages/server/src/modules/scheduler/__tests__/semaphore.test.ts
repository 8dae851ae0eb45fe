import { describe, expect, it } from "vitest";
import { Semaphore } from "../semaphore.js";

describe("Semaphore", () => {
  it("rejects a non-positive size", () => {
    expect(() => new Semaphore(0)).toThrow("size must be a positive integer");
    expect(() => new Semaphore(1.5)).toThrow("size must be a positive integer");
  });

  it("hands released slots to waiters in arrival order", async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const releaseFirst = await semaphore.acquire();
    const second = semaphore.acquire().then(release => {
      order.push("second");
      return release;
    });
    const third = semaphore.acquire().then(release => {
      order.push("third");
      return release;
    });

    expect(semaphore.pending).toBe(2);
    releaseFirst();
    const releaseSecond = await second;
    expect(order).toEqual(["second"]);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual(["second", "third"]);

    releaseThird();
    expect(semaphore.value).toBe(1);
  });

  it("ignores a second release of the same slot", async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();

    release();
    release();

    expect(semaphore.value).toBe(2);
  });
});
