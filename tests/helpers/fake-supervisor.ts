// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-process stand-in for ProcessSupervisor. Programs are scripted by a
 * handler; every call is recorded for assertions. `replace` records the
 * final invocation and interrupts, so a test sees the handoff as an
 * interruption instead of a process exit.
 */

import { Effect, Layer, Option } from "effect";
import { type HandoffFailed, SystemError } from "../../src/lib/errors";
import type { Argv } from "../../src/lib/types";
import type { ExecOptions, ExecResult, ProcessHandle } from "../../src/system/exec";
import { ProcessSupervisor } from "../../src/system/services/supervisor";

export type RunReply = ExecResult | SystemError;

/** Undefined means "exit 0 with no output". */
export type RunHandler = (argv: Argv, options: ExecOptions) => RunReply | undefined;

export interface RecordedRun {
  readonly argv: Argv;
  readonly options: ExecOptions;
}

export interface FakeProcessBehavior {
  /** How many liveness checks answer true before the process counts as dead. */
  readonly aliveChecks?: number;
  /** Exit code reported after termination. */
  readonly exitCode?: number;
  /** The process never exits after SIGTERM. */
  readonly ignoreTerm?: boolean;
}

export interface FakeProcess {
  readonly argv: Argv;
  readonly pid: number;
  aliveChecksLeft: number;
  terminated: boolean;
  releasedByScope: boolean;
}

export interface FakeSupervisor {
  readonly layer: Layer.Layer<ProcessSupervisor>;
  readonly runs: RecordedRun[];
  readonly processes: FakeProcess[];
  readonly replaced: Argv[];
}

export const ok = (stdout = ""): ExecResult => ({ exitCode: 0, stdout, stderr: "" });

export const exited = (exitCode: number, stderr = "", stdout = ""): ExecResult => ({
  exitCode,
  stdout,
  stderr,
});

export const makeFakeSupervisor = (
  options: {
    readonly run?: RunHandler;
    readonly process?: FakeProcessBehavior;
    readonly locate?: Readonly<Record<string, string>>;
    readonly replaceError?: HandoffFailed;
  } = {}
): FakeSupervisor => {
  const runs: RecordedRun[] = [];
  const processes: FakeProcess[] = [];
  const replaced: Argv[] = [];
  const behavior = options.process ?? {};

  const handleFor = (proc: FakeProcess): ProcessHandle => ({
    pid: proc.pid,
    isAlive: Effect.sync(() => {
      if (proc.terminated || proc.aliveChecksLeft <= 0) {
        return false;
      }
      proc.aliveChecksLeft -= 1;
      return true;
    }),
    terminate: Effect.sync(() => {
      proc.terminated = true;
    }),
    awaitExit: behavior.ignoreTerm === true ? Effect.never : Effect.succeed(behavior.exitCode ?? 0),
  });

  const layer = Layer.succeed(ProcessSupervisor, {
    run: (argv, execOptions = {}) =>
      Effect.suspend(() => {
        runs.push({ argv, options: execOptions });
        const reply = options.run?.(argv, execOptions) ?? ok();
        return reply instanceof SystemError ? Effect.fail(reply) : Effect.succeed(reply);
      }),
    spawn: (argv) =>
      Effect.acquireRelease(
        Effect.sync(() => {
          const proc: FakeProcess = {
            argv,
            pid: 1000 + processes.length,
            aliveChecksLeft: behavior.aliveChecks ?? Number.POSITIVE_INFINITY,
            terminated: false,
            releasedByScope: false,
          };
          processes.push(proc);
          return proc;
        }),
        (proc) =>
          Effect.sync(() => {
            proc.releasedByScope = true;
          })
      ).pipe(Effect.map(handleFor)),
    replace: (argv) =>
      Effect.suspend(() => {
        replaced.push(argv);
        return options.replaceError !== undefined
          ? Effect.fail(options.replaceError)
          : Effect.interrupt;
      }),
    locate: (name) => Effect.succeed(Option.fromNullable(options.locate?.[name])),
  });

  return { layer, runs, processes, replaced };
};

/** Arguments after the program name of every recorded run of `program`. */
export const runsOf = (fake: FakeSupervisor, program: string): readonly Argv[] =>
  fake.runs.filter((run) => run.argv[0] === program).map((run) => run.argv);

/** Text fed to stdin, decoded when it was bytes. */
export const stdinText = (run: RecordedRun): string =>
  typeof run.options.stdin === "string"
    ? run.options.stdin
    : run.options.stdin === undefined
      ? ""
      : new TextDecoder().decode(run.options.stdin);
