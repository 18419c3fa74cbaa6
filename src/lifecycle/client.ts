// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The command-line client, always connected as local root over the setup
 * instance's socket.
 */

import { Effect } from "effect";
import { ProvisioningFailed, type SystemError } from "../lib/errors";
import { type Argv, appendArgs } from "../lib/types";
import { type ExecResult, describeFailure } from "../system/exec";
import { ProcessSupervisor } from "../system/services/supervisor";

export const clientArgv = (client: string, socket: string, database?: string): Argv => {
  const base: Argv = [client, "--protocol=socket", "-uroot", "-hlocalhost", `--socket=${socket}`];
  return database === undefined ? base : appendArgs(base, database);
};

/** Feed `input` to the client and return the raw result. */
export const runClient = (
  argv: Argv,
  input: string | Uint8Array
): Effect.Effect<ExecResult, SystemError, ProcessSupervisor> =>
  Effect.flatMap(ProcessSupervisor, (supervisor) => supervisor.run(argv, { stdin: input }));

/**
 * Run a batch in one client session. A non-zero exit is ProvisioningFailed
 * tagged with `step`.
 */
export const executeSql = (
  argv: Argv,
  input: string | Uint8Array,
  step: string
): Effect.Effect<void, ProvisioningFailed, ProcessSupervisor> =>
  runClient(argv, input).pipe(
    Effect.mapError(
      (e) => new ProvisioningFailed({ message: `${step}: ${e.message}`, step })
    ),
    Effect.flatMap((result) =>
      result.exitCode === 0
        ? Effect.void
        : Effect.fail(
            new ProvisioningFailed({ message: `${step}: ${describeFailure(argv, result)}`, step })
          )
    )
  );
