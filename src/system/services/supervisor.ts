// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ProcessSupervisor service using Context.Tag pattern.
 * Every child process the entrypoint starts goes through this service, so
 * tests can substitute scripted programs for the database binaries.
 */

import { CommandExecutor, FileSystem } from "@effect/platform";
import { Context, Effect, Layer, type Option, type Scope } from "effect";
import type { HandoffFailed, SystemError } from "../../lib/errors";
import type { Argv } from "../../lib/types";
import {
  type ExecOptions,
  type ExecResult,
  type ProcessHandle,
  type SpawnOptions,
  exec,
  locate,
  replace,
  spawn,
} from "../exec";

export interface ProcessSupervisorService {
  /** Run to completion, capturing output. A non-zero exit is not an error here. */
  readonly run: (argv: Argv, options?: ExecOptions) => Effect.Effect<ExecResult, SystemError>;
  /** Start a child that the enclosing Scope terminates when it closes. */
  readonly spawn: (
    argv: Argv,
    options?: SpawnOptions
  ) => Effect.Effect<ProcessHandle, SystemError, Scope.Scope>;
  readonly replace: (argv: Argv) => Effect.Effect<never, HandoffFailed>;
  /** Path of an executable found on PATH. */
  readonly locate: (name: string) => Effect.Effect<Option.Option<string>>;
}

export interface ProcessSupervisor {
  readonly _tag: "ProcessSupervisor";
}

export const ProcessSupervisor: Context.Tag<ProcessSupervisor, ProcessSupervisorService> =
  Context.GenericTag<ProcessSupervisor, ProcessSupervisorService>("entrypoint/ProcessSupervisor");

/**
 * Live layer backed by the platform CommandExecutor and FileSystem.
 */
export const ProcessSupervisorLive: Layer.Layer<
  ProcessSupervisor,
  never,
  CommandExecutor.CommandExecutor | FileSystem.FileSystem
> = Layer.effect(
  ProcessSupervisor,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;
    const fs = yield* FileSystem.FileSystem;

    return {
      run: (argv, options) =>
        exec(argv, options).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor)),
      spawn: (argv, options) =>
        spawn(argv, options).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor)),
      replace: (argv) =>
        replace(argv).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor)),
      locate: (name) => locate(name).pipe(Effect.provideService(FileSystem.FileSystem, fs)),
    };
  })
);
