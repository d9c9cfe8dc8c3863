import { describe, test } from "node:test";
import assert from "node:assert";
import { RateGovernor, systemClock } from "../integrations/rate-governor";
import { FakeClock } from "./helpers/testHelpers";

/**
 * Largest number of admissions that fall inside any trailing window
 */
function peakWithinWindow(times: number[], windowMs: number): number {
  return Math.max(...times.map((t) => times.filter((other) => other <= t && t - other < windowMs).length));
}

void describe("RateGovernor", () => {
  void describe("constructor", () => {
    void test("should reject a non-positive ceiling", () => {
      assert.throws(() => new RateGovernor({ maxRequests: 0, windowMs: 1000 }), RangeError);
      assert.throws(() => new RateGovernor({ maxRequests: 1.5, windowMs: 1000 }), RangeError);
    });

    void test("should reject a non-positive window", () => {
      assert.throws(() => new RateGovernor({ maxRequests: 5, windowMs: 0 }), RangeError);
    });
  });

  void describe("admit", () => {
    void test("should admit immediately below the ceiling", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 3, windowMs: 1000, clock });

      await governor.admit();
      await governor.admit();
      await governor.admit();

      assert.deepStrictEqual(clock.sleeps, []);
      assert.strictEqual(governor.inFlightWindow(), 3);
    });

    void test("should hold the caller above the ceiling until the oldest admission ages out", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 3, windowMs: 1000, clock });
      const admittedAt: number[] = [];

      await Promise.all(
        Array.from({ length: 5 }, () => governor.admit().then(() => admittedAt.push(clock.now())))
      );

      assert.deepStrictEqual(admittedAt, [0, 0, 0, 1000, 1000]);
      assert.deepStrictEqual(clock.sleeps, [1000]);
    });

    void test("should never admit more than the ceiling in any window", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 4, windowMs: 60_000, clock });
      const admittedAt: number[] = [];

      await Promise.all(
        Array.from({ length: 25 }, () => governor.admit().then(() => admittedAt.push(clock.now())))
      );

      assert.strictEqual(admittedAt.length, 25);
      assert.ok(peakWithinWindow(admittedAt, 60_000) <= 4);
    });

    void test("should use a sliding window rather than fixed buckets", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 2, windowMs: 1000, clock });

      await governor.admit();
      clock.time = 600;
      await governor.admit();
      clock.time = 900;
      await governor.admit();
      assert.strictEqual(clock.now(), 1000);

      await governor.admit();
      assert.strictEqual(clock.now(), 1600);
      assert.deepStrictEqual(clock.sleeps, [100, 600]);
    });

    void test("should admit waiting callers in arrival order", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 1, windowMs: 500, clock });
      const order: number[] = [];

      await Promise.all([0, 1, 2, 3].map((i) => governor.admit().then(() => order.push(i))));

      assert.deepStrictEqual(order, [0, 1, 2, 3]);
      assert.deepStrictEqual(clock.sleeps, [500, 500, 500]);
    });

    void test("should keep admitting after a failing clock", async () => {
      let failNext = true;
      const clock = new FakeClock();
      const flaky = {
        now: () => clock.now(),
        sleep: async (ms: number) => {
          if (failNext) {
            failNext = false;
            throw new Error("timer unavailable");
          }
          await clock.sleep(ms);
        },
      };
      const governor = new RateGovernor({ maxRequests: 1, windowMs: 100, clock: flaky });

      await governor.admit();
      await governor.admit();
      await governor.admit();

      assert.deepStrictEqual(clock.sleeps, [100]);
    });
  });

  void describe("inFlightWindow", () => {
    void test("should drop admissions older than the window", async () => {
      const clock = new FakeClock();
      const governor = new RateGovernor({ maxRequests: 5, windowMs: 1000, clock });

      await governor.admit();
      clock.time = 500;
      await governor.admit();
      clock.time = 1000;

      assert.strictEqual(governor.inFlightWindow(), 1);
    });
  });

  void describe("systemClock", () => {
    void test("should end a sleep early when its signal aborts", async () => {
      const controller = new AbortController();
      const started = Date.now();

      const sleeping = systemClock.sleep(60_000, controller.signal);
      controller.abort();
      await sleeping;

      assert.ok(Date.now() - started < 1000);
    });

    void test("should not sleep at all on an already aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      const started = Date.now();

      await systemClock.sleep(60_000, controller.signal);

      assert.ok(Date.now() - started < 1000);
    });
  });
});
