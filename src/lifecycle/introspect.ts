// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Config Validator. The server's `--verbose --help` output is the effective
 * configuration after every option file and argument has been applied, so it
 * is consulted instead of parsing option files.
 */

import { tmpdir } from "node:os";
import { posix } from "node:path";
import { Effect, Option, pipe } from "effect";
import { InvalidConfiguration, type SystemError } from "../lib/errors";
import { generateHex } from "../lib/crypto";
import { type Argv, appendArgs, formatArgv } from "../lib/types";
import type { ExecResult } from "../system/exec";
import { ProcessSupervisor } from "../system/services/supervisor";

export type EffectiveConfig = ReadonlyMap<string, string>;

/**
 * The throwaway `--log-bin-index` keeps introspection from touching the real
 * binlog index. The path is never created.
 */
export const introspectionArgv = (argv: Argv): Argv =>
  appendArgs(
    argv,
    "--verbose",
    "--help",
    `--log-bin-index=${posix.join(tmpdir(), `introspect-${generateHex(8)}.index`)}`
  );

const introspect = (
  argv: Argv
): Effect.Effect<
  { readonly command: Argv; readonly result: ExecResult },
  SystemError,
  ProcessSupervisor
> =>
  Effect.gen(function* () {
    const supervisor = yield* ProcessSupervisor;
    const command = introspectionArgv(argv);
    const result = yield* supervisor.run(command);
    return { command, result };
  });

/**
 * Key/value table from introspection output. A line contributes when it does
 * not start with whitespace; its first field is the key and its second the
 * value. The first occurrence of a key wins.
 */
export const parseEffectiveConfig = (stdout: string): EffectiveConfig => {
  const table = new Map<string, string>();
  for (const line of stdout.split("\n")) {
    if (/^\s/.test(line)) {
      continue;
    }
    const [key, value] = line.trim().split(/\s+/);
    if (key !== undefined && key !== "" && value !== undefined && !table.has(key)) {
      table.set(key, value);
    }
  }
  return table;
};

/**
 * Fails when the server writes anything to stderr or exits non-zero while
 * checking its configuration. Never retried.
 */
export const validateConfiguration = (
  argv: Argv
): Effect.Effect<void, InvalidConfiguration | SystemError, ProcessSupervisor> =>
  Effect.gen(function* () {
    const { command, result } = yield* introspect(argv);
    const stderr = result.stderr.trim();
    if (stderr === "" && result.exitCode === 0) {
      return;
    }
    const output = stderr !== "" ? stderr : `exit code ${result.exitCode}`;
    yield* Effect.logError("Config validation error, please check your configuration!");
    return yield* Effect.fail(
      new InvalidConfiguration({
        message: `Config validation failed: ${formatArgv(command)}\n${output}`,
        command: formatArgv(command),
        output,
      })
    );
  });

export const effectiveValue = (
  argv: Argv,
  key: string
): Effect.Effect<Option.Option<string>, SystemError, ProcessSupervisor> =>
  Effect.map(introspect(argv), ({ result }) =>
    Option.fromNullable(parseEffectiveConfig(result.stdout).get(key))
  );

/** Like effectiveValue, but a missing key is InvalidConfiguration. */
export const requireEffectiveValue = (
  argv: Argv,
  key: string
): Effect.Effect<string, InvalidConfiguration | SystemError, ProcessSupervisor> =>
  pipe(
    effectiveValue(argv, key),
    Effect.flatMap(
      Option.match({
        onNone: () =>
          Effect.fail(
            new InvalidConfiguration({
              message: `Cannot determine '${key}' from ${formatArgv(argv)}`,
            })
          ),
        onSome: Effect.succeed,
      })
    )
  );
