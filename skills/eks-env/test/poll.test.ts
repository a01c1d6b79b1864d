import { describe, expect, it, vi } from "vitest";
import { pollUntil } from "../src/tools/poll.js";
import { FakeClock } from "./support/fake-clock.js";

describe("pollUntil", () => {
  it("returns on the first accepted value without sleeping", async () => {
    const clock = new FakeClock();
    const result = await pollUntil(async () => 3, v => v === 3, { intervalMs: 1_000, timeoutMs: 5_000, clock });
    expect(result).toEqual({ ok: true, value: 3, elapsedMs: 0, attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it("keeps probing until the value is accepted", async () => {
    const clock = new FakeClock();
    let n = 0;
    const result = await pollUntil(async () => ++n, v => v >= 3, { intervalMs: 1_000, timeoutMs: 60_000, clock });
    expect(result).toEqual({ ok: true, value: 3, elapsedMs: 2_000, attempts: 3 });
  });

  it("gives up once the budget is spent and never sleeps past it", async () => {
    const clock = new FakeClock();
    const onWait = vi.fn();
    const result = await pollUntil(async () => "pending", v => v === "done", {
      intervalMs: 4_000,
      timeoutMs: 10_000,
      clock,
      onWait,
    });
    expect(result.ok).toBe(false);
    expect(result.value).toBe("pending");
    expect(clock.sleeps).toEqual([4_000, 4_000, 2_000]);
    expect(result.elapsedMs).toBe(10_000);
    expect(result.attempts).toBe(4);
    expect(onWait).toHaveBeenCalledTimes(3);
  });

  it("checks exactly once with a zero budget", async () => {
    const clock = new FakeClock();
    const check = vi.fn(async () => false);
    const result = await pollUntil(check, Boolean, { intervalMs: 1_000, timeoutMs: 0, clock });
    expect(result.ok).toBe(false);
    expect(check).toHaveBeenCalledTimes(1);
  });
});
