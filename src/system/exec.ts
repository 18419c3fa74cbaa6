// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Process execution via the @effect/platform Command API, in three shapes:
 * - exec: run to completion, capturing stdout/stderr
 * - spawn: start a long-running child owned by the caller's Scope
 * - replace: the terminal handoff; runs the child in the foreground and
 *   exits this process with the child's exit code
 */

import { constants } from "node:os";
import { posix } from "node:path";
import { Command, type CommandExecutor, FileSystem } from "@effect/platform";
import { type Duration, Effect, Option, type Scope, Stream, pipe } from "effect";
import { FAILURE_EXIT_CODE, HandoffFailed, SystemError, errorMessage } from "../lib/errors";
import { type Argv, formatArgv } from "../lib/types";

export interface ExecOptions {
  readonly env?: Readonly<Record<string, string>>;
  /** Text is fed as UTF-8; bytes are streamed as is. */
  readonly stdin?: string | Uint8Array;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * A spawned child. Owned by whoever spawned it; the spawning Scope kills it
 * if it is still running when the scope closes.
 */
export interface ProcessHandle {
  readonly pid: number;
  readonly isAlive: Effect.Effect<boolean, SystemError>;
  /** Sends SIGTERM and waits for the exit. */
  readonly terminate: Effect.Effect<void, SystemError>;
  readonly awaitExit: Effect.Effect<number, SystemError>;
}

const execError = (argv: readonly string[], e: unknown): SystemError =>
  new SystemError({
    message: `Failed to execute: ${formatArgv(argv)}: ${errorMessage(e)}`,
    cause: e,
  });

const buildCommand = (argv: Argv, options: ExecOptions): Command.Command => {
  const [cmd, ...args] = argv;
  return pipe(
    Command.make(cmd, ...args),
    (c) => (options.env !== undefined ? Command.env(c, options.env) : c),
    (c) =>
      typeof options.stdin === "string"
        ? Command.feed(c, options.stdin)
        : options.stdin !== undefined
          ? Command.stdin(c, Stream.make(options.stdin))
          : c
  );
};

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

export const exec = (
  argv: Argv,
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError, CommandExecutor.CommandExecutor> =>
  Effect.gen(function* () {
    const child = yield* Command.start(buildCommand(argv, options));

    // Parallel capture: exitCode + both streams ready independently
    const [exitCode, stdout, stderr] = yield* Effect.all(
      [child.exitCode, streamToString(child.stdout), streamToString(child.stderr)],
      { concurrency: 3 }
    );

    return { exitCode, stdout, stderr };
  }).pipe(
    Effect.scoped,
    Effect.mapError((e) => execError(argv, e))
  );

export interface SpawnOptions {
  /** How long the closing Scope waits after SIGTERM before sending SIGKILL. */
  readonly killAfter?: Duration.DurationInput;
}

const DEFAULT_KILL_AFTER = "10 seconds";

/**
 * Registered after the platform's own release, so it runs first: SIGTERM,
 * then SIGKILL once `killAfter` elapses. The platform release is then a no-op.
 */
const killOnRelease = (
  child: CommandExecutor.Process,
  killAfter: Duration.DurationInput
): Effect.Effect<void, never, Scope.Scope> =>
  Effect.addFinalizer(() =>
    Effect.gen(function* () {
      const running = yield* child.isRunning.pipe(Effect.orElseSucceed(() => false));
      if (!running) {
        return;
      }
      const stopped = yield* child
        .kill("SIGTERM")
        .pipe(Effect.timeout(killAfter), Effect.isSuccess);
      if (!stopped) {
        yield* Effect.logWarning(`Process ${child.pid} still running, sending SIGKILL`);
        yield* child
          .kill("SIGKILL")
          .pipe(
            Effect.catchAll((e) =>
              Effect.logWarning(`Could not kill process ${child.pid}: ${errorMessage(e)}`)
            )
          );
      }
    })
  );

export const spawn = (
  argv: Argv,
  options: SpawnOptions = {}
): Effect.Effect<ProcessHandle, SystemError, CommandExecutor.CommandExecutor | Scope.Scope> =>
  Effect.gen(function* () {
    const command = pipe(
      buildCommand(argv, {}),
      (c) => Command.stdout(c, "inherit"),
      (c) => Command.stderr(c, "inherit")
    );
    const child = yield* Command.start(command);
    yield* killOnRelease(child, options.killAfter ?? DEFAULT_KILL_AFTER);
    const wrap = <A>(
      effect: Effect.Effect<A, unknown>,
      action: string
    ): Effect.Effect<A, SystemError> =>
      Effect.mapError(
        effect,
        (e) =>
          new SystemError({
            message: `Failed to ${action} process ${child.pid} (${argv[0]}): ${errorMessage(e)}`,
            cause: e,
          })
      );

    const handle: ProcessHandle = {
      pid: child.pid,
      isAlive: wrap(child.isRunning, "query"),
      terminate: wrap(child.kill("SIGTERM"), "signal"),
      awaitExit: wrap(child.exitCode, "wait for"),
    };
    return handle;
  }).pipe(Effect.mapError((e) => execError(argv, e)));

/** Signals a container runtime sends that the server must see. */
const FORWARDED_SIGNALS = [
  "SIGTERM",
  "SIGINT",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR1",
  "SIGUSR2",
] as const satisfies readonly CommandExecutor.Signal[];

const forwardSignals = (
  child: CommandExecutor.Process
): Effect.Effect<void, never, Scope.Scope> =>
  Effect.forEach(
    FORWARDED_SIGNALS,
    (signal) =>
      Effect.acquireRelease(
        Effect.sync(() => {
          const listener = (): void => {
            Effect.runFork(
              child
                .kill(signal)
                .pipe(
                  Effect.catchAll((e) =>
                    Effect.logWarning(`Could not forward ${signal}: ${errorMessage(e)}`)
                  )
                )
            );
          };
          process.on(signal, listener);
          return listener;
        }),
        (listener) =>
          Effect.sync(() => {
            process.off(signal, listener);
          })
      ),
    { discard: true }
  );

const SIGNAL_EXIT_BASE = 128;

/**
 * Exit status for a child killed by a signal, as a shell reports it:
 * 128 plus the signal number.
 */
export const signalExitCode = (e: unknown): number => {
  const name = /signal: (SIG[A-Z0-9]+)/.exec(errorMessage(e))?.[1];
  const signo: unknown = Object.entries(constants.signals).find(([key]) => key === name)?.[1];
  return typeof signo === "number" ? SIGNAL_EXIT_BASE + signo : FAILURE_EXIT_CODE;
};

/**
 * Runs the server in the foreground with inherited stdio and forwarded
 * signals, and yields its exit status. Only a failure to start it is an error.
 */
export const runForeground = (
  argv: Argv
): Effect.Effect<number, HandoffFailed, CommandExecutor.CommandExecutor> =>
  Effect.scoped(
    Effect.gen(function* () {
      const command = pipe(
        Command.make(argv[0], ...argv.slice(1)),
        (c) => Command.stdin(c, "inherit"),
        (c) => Command.stdout(c, "inherit"),
        (c) => Command.stderr(c, "inherit")
      );
      const child = yield* Command.start(command).pipe(
        Effect.mapError(
          (e) =>
            new HandoffFailed({
              message: `Failed to start ${formatArgv(argv)}: ${errorMessage(e)}`,
              cause: e,
            })
        )
      );
      yield* forwardSignals(child);
      return yield* child.exitCode.pipe(
        Effect.catchAll((e) =>
          Effect.as(Effect.logWarning(errorMessage(e)), signalExitCode(e))
        )
      );
    })
  );

/**
 * Terminal handoff. Node cannot replace its own process image, so this
 * process exits with the server's exit status. Never returns.
 */
export const replace = (
  argv: Argv
): Effect.Effect<never, HandoffFailed, CommandExecutor.CommandExecutor> =>
  runForeground(argv).pipe(
    Effect.flatMap((code) => Effect.sync((): never => process.exit(code)))
  );

/** Resolves a program name the way a shell would: the first executable file on PATH wins. */
export const locate = (
  name: string,
  searchPath: string = process.env["PATH"] ?? ""
): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const candidates = name.includes("/")
      ? [name]
      : searchPath
          .split(":")
          .filter((dir) => dir !== "")
          .map((dir) => posix.join(dir, name));

    return yield* Effect.findFirst(candidates, (candidate) =>
      fs.stat(candidate).pipe(
        Effect.map((info) => info.type === "File" && (info.mode & 0o111) !== 0),
        Effect.catchAll((e) =>
          Effect.as(Effect.logDebug(`Skipping ${candidate}: ${errorMessage(e)}`), false)
        )
      )
    );
  });

export const isSuccess = (result: ExecResult): boolean => result.exitCode === 0;

export const describeFailure = (argv: readonly string[], result: ExecResult): string => {
  const stderr = result.stderr.trim();
  const summary = `Command failed with exit code ${result.exitCode}: ${formatArgv(argv)}`;
  return stderr ? `${summary}\n${stderr}` : summary;
};
