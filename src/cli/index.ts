// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Program assembly: load the entrypoint's own settings, install the logger
 * they describe, and run the start sequence for the container command.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { type EntrypointConfig, EntrypointConfigSpec } from "../config/env";
import type { EnvRecord } from "../config/secrets";
import { EntrypointLoggerLive } from "../lib/effect-logger";
import { type EntrypointError, InvalidConfiguration, errorMessage } from "../lib/errors";
import { reportDiagnostics } from "../lifecycle/diagnostics";
import { runEntrypoint } from "../lifecycle/orchestrator";
import type { ProcessSupervisor } from "../system/services/supervisor";
import { parseInvocation } from "./parser";

export const loadEntrypointConfig: Effect.Effect<EntrypointConfig, InvalidConfiguration> =
  Effect.gen(function* () {
    return yield* EntrypointConfigSpec;
  }).pipe(
    Effect.mapError(
      (e) =>
        new InvalidConfiguration({ message: `Invalid entrypoint settings: ${errorMessage(e)}` })
    )
  );

/**
 * Never succeeds: the run ends in the handoff, which exits the process, or
 * in an error.
 */
export const program = (
  args: readonly string[],
  env: EnvRecord
): Effect.Effect<never, EntrypointError, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const config = yield* loadEntrypointConfig.pipe(
      Effect.tapError((error) => reportDiagnostics(error, Option.none()))
    );
    const argv = parseInvocation(args, config.binaries.server);
    return yield* runEntrypoint(argv, config, env).pipe(
      Effect.provide(EntrypointLoggerLive(config.logging))
    );
  });
