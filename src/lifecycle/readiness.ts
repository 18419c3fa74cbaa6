// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Waits for the setup instance to answer queries. There is no attempt
 * ceiling: a slow first start is tolerated for as long as the process lives.
 */

import { type Duration, Effect } from "effect";
import { StartupFailed, type SystemError } from "../lib/errors";
import { readinessSchedule } from "../lib/retry";
import type { Argv } from "../lib/types";
import type { ProcessHandle } from "../system/exec";
import { runClient } from "./client";
import type { ProcessSupervisor } from "../system/services/supervisor";

export const READINESS_QUERY = "SELECT @@wsrep_on;";

/** True once the client can run the readiness query over the socket. */
export const probeClient = (
  client: Argv
): Effect.Effect<boolean, SystemError, ProcessSupervisor> =>
  Effect.map(runClient(client, READINESS_QUERY), (result) => result.exitCode === 0);

export const awaitReady = <R>(
  handle: ProcessHandle,
  probe: Effect.Effect<boolean, SystemError, R>,
  options: { readonly interval: Duration.DurationInput; readonly product: string }
): Effect.Effect<void, StartupFailed | SystemError, R> => {
  const attempt = Effect.gen(function* () {
    const alive = yield* handle.isAlive;
    if (!alive) {
      return yield* Effect.fail(
        new StartupFailed({ message: `${options.product} failed to start!` })
      );
    }
    const ready = yield* probe;
    if (!ready) {
      yield* Effect.log(`${options.product} initialization startup in progress...`);
    }
    return ready;
  });

  return attempt.pipe(
    Effect.repeat({ schedule: readinessSchedule(options.interval), until: (ready) => ready }),
    Effect.asVoid
  );
};
