// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Initializer: creates the on-disk data store at most once per data
 * directory. A failed run leaves the directory as it is for inspection.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { InitializationFailed, type InvalidConfiguration, type SystemError } from "../lib/errors";
import { type Argv, appendArgs } from "../lib/types";
import { clearDirectory } from "../system/fs";
import { ProcessSupervisor } from "../system/services/supervisor";
import { describeFailure, isSuccess } from "../system/exec";
import type { RootPassword } from "../config/settings";
import { type DataLayout, hasDataStore } from "./layout";
import { missingRootPassword } from "./root-account";

export const INITIALIZE_ARGS = ["--initialize-insecure", "--tls-version="] as const;

/** A fresh data store needs a decision about the root password. */
export const requireRootPassword = (
  rootPassword: RootPassword
): Effect.Effect<void, InvalidConfiguration> =>
  rootPassword._tag === "Unspecified" ? Effect.fail(missingRootPassword()) : Effect.void;

/**
 * Returns whether initialization ran. An existing data store is left alone.
 */
export const initializeDataStore = (
  argv: Argv,
  layout: DataLayout,
  rootPassword: RootPassword
): Effect.Effect<
  boolean,
  InitializationFailed | InvalidConfiguration | SystemError,
  ProcessSupervisor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    if (yield* hasDataStore(layout)) {
      yield* Effect.log(`Data directory ${layout.dataDir} already initialized, skipping`);
      return false;
    }
    yield* requireRootPassword(rootPassword);

    yield* clearDirectory(layout.dataDir).pipe(
      Effect.mapError(
        (e) =>
          new InitializationFailed({
            message: `Cannot prepare data directory ${layout.dataDir}: ${e.message}`,
          })
      )
    );

    yield* Effect.log("Initializing data directory...");
    const supervisor = yield* ProcessSupervisor;
    const command = appendArgs(argv, ...INITIALIZE_ARGS);
    const result = yield* supervisor.run(command);
    if (result.stdout.trim() !== "") {
      yield* Effect.logDebug(result.stdout.trimEnd());
    }
    if (!isSuccess(result)) {
      return yield* Effect.fail(
        new InitializationFailed({
          message: describeFailure(command, result),
          exitCode: result.exitCode,
        })
      );
    }

    if (!(yield* hasDataStore(layout))) {
      return yield* Effect.fail(
        new InitializationFailed({
          message: `Initialization finished but ${layout.systemDbDir} was not created`,
        })
      );
    }
    yield* Effect.log("Data directory initialized");
    return true;
  });
