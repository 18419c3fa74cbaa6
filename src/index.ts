#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Container entrypoint for a clustered MySQL node.
 *
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer, Option } from "effect";
import { program } from "./cli/index";
import { FAILURE_EXIT_CODE, errorMessage } from "./lib/errors";
import { ProcessSupervisorLive } from "./system/services/supervisor";

const MainLayer = ProcessSupervisorLive.pipe(Layer.provideMerge(NodeContext.layer));

const logExitError = <E extends { readonly message: string }>(exit: Exit.Exit<never, E>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err): void => console.error(`Error: ${err.message}`),
      }),
  });

/**
 * The program only returns on failure; a successful handoff exits from
 * inside with the server's own exit code.
 */
async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(
    program(process.argv.slice(2), process.env).pipe(Effect.provide(MainLayer))
  );
  logExitError(exit);
  process.exit(FAILURE_EXIT_CODE);
}

// Only run if this is the main entry point
if (require.main === module) {
  main().catch((e: unknown) => {
    console.error("Unexpected error:", errorMessage(e));
    process.exit(FAILURE_EXIT_CODE);
  });
}
