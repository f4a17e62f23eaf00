import assert from "node:assert/strict";
import test from "node:test";
import { CircuitBreaker, type CircuitBreakerConfig } from "./circuit-breaker.js";

const config: CircuitBreakerConfig = {
  maxErrors: 3,
  windowSeconds: 60,
  cooldownSeconds: 300,
  action: "stop"
};

function clockAt(iso: string) {
  let now = new Date(iso);
  return {
    now: () => now,
    advance: (ms: number) => {
      now = new Date(now.getTime() + ms);
    }
  };
}

test("circuit breaker trips after threshold in window", () => {
  const clock = clockAt("2026-02-09T00:00:00.000Z");
  const breaker = new CircuitBreaker(config, clock.now);

  assert.equal(breaker.recordError("err1"), false);
  assert.equal(breaker.state.consecutiveErrors, 1);
  assert.equal(breaker.state.errorWindowStartAt?.toISOString(), "2026-02-09T00:00:00.000Z");

  clock.advance(10_000);
  assert.equal(breaker.recordError("err2"), false);
  assert.equal(breaker.state.consecutiveErrors, 2);
  assert.equal(breaker.state.lastErrorMessage, "err2");
  assert.equal(breaker.state.lastErrorAt?.toISOString(), "2026-02-09T00:00:10.000Z");

  clock.advance(10_000);
  assert.equal(breaker.recordError("err3"), true);
});

test("circuit breaker window resets after timeout", () => {
  const clock = clockAt("2026-02-09T00:00:00.000Z");
  const breaker = new CircuitBreaker(config, clock.now);

  breaker.recordError("err1");
  clock.advance(30_000);
  breaker.recordError("err2");
  clock.advance(31_000);

  assert.equal(breaker.recordError("err3"), false);
  assert.equal(breaker.state.consecutiveErrors, 1);
  assert.equal(breaker.state.errorWindowStartAt?.toISOString(), "2026-02-09T00:01:01.000Z");
});

test("an error exactly at the window edge still counts in the window", () => {
  const clock = clockAt("2026-02-09T00:00:00.000Z");
  const breaker = new CircuitBreaker({ ...config, maxErrors: 2 }, clock.now);

  breaker.recordError("err1");
  clock.advance(60_000);

  assert.equal(breaker.recordError("err2"), true);
});

test("tripping starts a fresh window", () => {
  const clock = clockAt("2026-02-09T00:00:00.000Z");
  const breaker = new CircuitBreaker(config, clock.now);

  breaker.recordError("gateway timeout");
  breaker.recordError("gateway timeout");
  assert.equal(breaker.recordError("gateway timeout"), true);

  assert.deepEqual(breaker.state, {
    consecutiveErrors: 0,
    errorWindowStartAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  });
  assert.equal(breaker.recordError("gateway timeout"), false);
  assert.equal(breaker.state.consecutiveErrors, 1);
});
