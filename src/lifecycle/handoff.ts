// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Handoff Runner: the final server takes over. Never returns on success.
 */

import { Effect } from "effect";
import type { HandoffFailed } from "../lib/errors";
import { type Argv, formatArgv } from "../lib/types";
import { ProcessSupervisor } from "../system/services/supervisor";

export const handoff = (argv: Argv): Effect.Effect<never, HandoffFailed, ProcessSupervisor> =>
  Effect.gen(function* () {
    const supervisor = yield* ProcessSupervisor;
    yield* Effect.log(`Starting '${formatArgv(argv)}'`);
    return yield* supervisor.replace(argv);
  });
