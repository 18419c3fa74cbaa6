// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, HashMap, Logger } from "effect";
import { describe, expect, test } from "vitest";
import { logFail, logSuccess, trackStages } from "../../src/lib/log";

interface Captured {
  readonly message: string;
  readonly annotations: Readonly<Record<string, unknown>>;
}

const capture = (effect: Effect.Effect<void>): readonly Captured[] => {
  const captured: Captured[] = [];
  const logger = Logger.make(({ message, annotations }) => {
    captured.push({
      message: String(message),
      annotations: Object.fromEntries(HashMap.toEntries(annotations)),
    });
  });
  Effect.runSync(effect.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger))));
  return captured;
};

describe("trackStages", () => {
  test("numbers stages in the order they are reached", () => {
    const captured = capture(
      Effect.gen(function* () {
        const stages = yield* trackStages(2);
        yield* stages.advance("Creating application database");
        yield* stages.advance("Configuring root account");
      })
    );

    expect(captured).toEqual([
      {
        message: "Creating application database",
        annotations: { logStyle: "step", stepNumber: "1", stepTotal: "2" },
      },
      {
        message: "Configuring root account",
        annotations: { logStyle: "step", stepNumber: "2", stepTotal: "2" },
      },
    ]);
  });

  test("each tracker counts from one", () => {
    const captured = capture(
      Effect.gen(function* () {
        const first = yield* trackStages(3);
        yield* first.advance("a");
        const second = yield* trackStages(3);
        yield* second.advance("b");
      })
    );
    expect(captured.map((entry) => entry.annotations["stepNumber"])).toEqual(["1", "1"]);
  });
});

test("success and failure markers", () => {
  const captured = capture(
    Effect.all([logSuccess("setup complete"), logFail("StartupFailed")], { discard: true })
  );
  expect(captured).toEqual([
    { message: "setup complete", annotations: { logStyle: "success" } },
    { message: "StartupFailed", annotations: { logStyle: "fail" } },
  ]);
});
