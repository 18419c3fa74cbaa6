// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, Exit, Fiber, Layer, Logger, Option, TestClock, TestContext } from "effect";
import { describe, expect, test } from "vitest";
import { READINESS_QUERY, awaitReady, probeClient } from "../../src/lifecycle/readiness";
import type { ProcessHandle } from "../../src/system/exec";
import { exited, makeFakeSupervisor, ok, stdinText } from "../helpers/fake-supervisor";

const TestEnv = Layer.merge(
  TestContext.TestContext,
  Logger.replace(Logger.defaultLogger, Logger.none)
);

const runWithTestClock = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestEnv)));

/** A handle whose liveness answers true `checks` times. */
const handleAliveFor = (checks: number): ProcessHandle => {
  let left = checks;
  return {
    pid: 4242,
    isAlive: Effect.sync(() => {
      left -= 1;
      return left >= 0;
    }),
    terminate: Effect.void,
    awaitExit: Effect.succeed(0),
  };
};

/** Probe that succeeds on attempt number `readyOn`; `attempts` counts calls. */
const countingProbe = (readyOn: number) => {
  const state = { attempts: 0 };
  const probe = Effect.sync(() => {
    state.attempts += 1;
    return state.attempts >= readyOn;
  });
  return { state, probe };
};

const options = { interval: "1 second", product: "test-product" } as const;

describe("awaitReady", () => {
  test("ready on the first probe does not wait", async () => {
    const { state, probe } = countingProbe(1);
    const elapsed = await runWithTestClock(
      Effect.gen(function* () {
        yield* awaitReady(handleAliveFor(Number.POSITIVE_INFINITY), probe, options);
        return yield* TestClock.currentTimeMillis;
      })
    );
    expect(state.attempts).toBe(1);
    expect(elapsed).toBe(0);
  });

  test("polls once per interval until the probe succeeds", async () => {
    const { state, probe } = countingProbe(3);
    const elapsed = await runWithTestClock(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(
          awaitReady(handleAliveFor(Number.POSITIVE_INFINITY), probe, options)
        );
        yield* TestClock.adjust("1 second");
        yield* TestClock.adjust("1 second");
        yield* Fiber.join(fiber);
        return yield* TestClock.currentTimeMillis;
      })
    );
    expect(state.attempts).toBe(3);
    expect(elapsed).toBe(2000);
  });

  test("the instance dying before it answers is StartupFailed", async () => {
    const { state, probe } = countingProbe(Number.POSITIVE_INFINITY);
    const exit = await runWithTestClock(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(awaitReady(handleAliveFor(2), probe, options));
        yield* TestClock.adjust("1 second");
        yield* TestClock.adjust("1 second");
        return yield* Fiber.await(fiber);
      })
    );

    expect(state.attempts).toBe(2);
    const error = Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
    expect(Option.map(error, (e) => e.message)).toEqual(
      Option.some("test-product failed to start!")
    );
  });

  test("a dead instance is never probed", async () => {
    const { state, probe } = countingProbe(1);
    const exit = await runWithTestClock(Effect.exit(awaitReady(handleAliveFor(0), probe, options)));
    expect(Exit.isFailure(exit)).toBe(true);
    expect(state.attempts).toBe(0);
  });
});

describe("probeClient", () => {
  const client = [
    "mysql",
    "--protocol=socket",
    "-uroot",
    "-hlocalhost",
    "--socket=/run/test.sock",
  ] as const;

  test("feeds the readiness query to the client", async () => {
    const fake = makeFakeSupervisor({ run: () => ok("@@wsrep_on\n0\n") });
    const ready = await Effect.runPromise(probeClient(client).pipe(Effect.provide(fake.layer)));
    expect(ready).toBe(true);
    expect(fake.runs.map((run) => run.argv)).toEqual([client]);
    const [run] = fake.runs;
    expect(run === undefined ? "" : stdinText(run)).toBe(READINESS_QUERY);
  });

  test("a failing client means not ready", async () => {
    const fake = makeFakeSupervisor({ run: () => exited(1, "Can't connect") });
    const ready = await Effect.runPromise(probeClient(client).pipe(Effect.provide(fake.layer)));
    expect(ready).toBe(false);
  });
});
