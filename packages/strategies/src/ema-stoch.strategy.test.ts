import assert from "node:assert/strict";
import test from "node:test";
import type { IndicatorSnapshot, IntentSide } from "@ptb/futures-core";
import { EmaStochStrategy } from "./ema-stoch.strategy.js";

function snapshot(overrides: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
  return {
    timestamp: 0,
    close: 100,
    volume: 100,
    emaFast: 100,
    emaSlow: 100,
    stochK: 50,
    stochD: 50,
    atr: 2,
    volAvg: 100,
    ...overrides
  };
}

const strategy = new EmaStochStrategy();

test("ema cross up with stochastic leaving oversold and volume above average enters long", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 15, stochD: 18 });
  const curr = snapshot({ timestamp: 1, emaFast: 102, emaSlow: 101, stochK: 22, stochD: 19, volume: 120, volAvg: 100 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "enter_long");
});

test("long entry needs the volume filter", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 15, stochD: 18 });
  const curr = snapshot({ emaFast: 102, emaSlow: 101, stochK: 22, stochD: 19, volume: 99, volAvg: 100 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
});

test("long entry needs stochastic confirmation from the oversold zone", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 35, stochD: 30 });
  const curr = snapshot({ emaFast: 102, emaSlow: 101, stochK: 40, stochD: 33, volume: 120 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
});

test("long entry needs %K to cross above %D, not merely stay above it", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 15, stochD: 10 });
  const curr = snapshot({ emaFast: 102, emaSlow: 101, stochK: 22, stochD: 19, volume: 120 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
});

test("short entry needs %K to cross below %D", () => {
  const prev = snapshot({ emaFast: 101, emaSlow: 100, stochK: 85, stochD: 90 });
  const curr = snapshot({ emaFast: 99, emaSlow: 100, stochK: 78, stochD: 83 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
});

test("ema cross down with stochastic leaving overbought enters short", () => {
  const prev = snapshot({ emaFast: 101, emaSlow: 100, stochK: 88, stochD: 85 });
  const curr = snapshot({ emaFast: 99, emaSlow: 100, stochK: 78, stochD: 83, volume: 100, volAvg: 100 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "enter_short");
});

test("no entries while a position is held", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 15, stochD: 18 });
  const curr = snapshot({ emaFast: 102, emaSlow: 101, stochK: 22, stochD: 19, volume: 120 });

  assert.equal(strategy.evaluate(prev, curr, "long"), "none");
  assert.equal(strategy.evaluate(prev, curr, "short"), "exit_short");
});

test("trend reversal exits the held side", () => {
  const prev = snapshot({ emaFast: 102, emaSlow: 101 });
  const curr = snapshot({ emaFast: 100.5, emaSlow: 101 });

  assert.equal(strategy.evaluate(prev, curr, "long"), "exit_long");
  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
});

test("not-yet-valid indicators hold", () => {
  const prev = snapshot({ emaFast: 100, emaSlow: 101, stochK: 15, stochD: 18 });
  const curr = snapshot({ emaFast: 102, emaSlow: 101, stochK: 22, stochD: null, volume: 120 });

  assert.equal(strategy.evaluate(prev, curr, "flat"), "none");
  assert.equal(strategy.evaluate(null, snapshot(), "flat"), "none");
  assert.equal(strategy.evaluate(snapshot({ atr: null }), snapshot({ emaFast: 90 }), "long"), "none");
});

test("never emits both entries across a grid of snapshots", () => {
  const values = [10, 50, 90];
  const emas = [99, 100, 101];
  const sides: IntentSide[] = ["flat", "long", "short"];
  for (const pk of values) {
    for (const ck of values) {
      for (const pf of emas) {
        for (const cf of emas) {
          for (const side of sides) {
            const prev = snapshot({ emaFast: pf, stochK: pk, stochD: 50 });
            const curr = snapshot({ emaFast: cf, stochK: ck, stochD: 50 });
            const signal = strategy.evaluate(prev, curr, side);
            if (side !== "flat") {
              assert.ok(signal !== "enter_long" && signal !== "enter_short");
            }
            if (signal === "enter_long") {
              assert.ok(cf > 100 && pf <= 100);
            }
            if (signal === "enter_short") {
              assert.ok(cf < 100 && pf >= 100);
            }
          }
        }
      }
    }
  }
});
