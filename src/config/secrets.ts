// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * File-or-value resolution for database inputs. `NAME` and `NAME_FILE` are
 * mutually exclusive; the `_FILE` form names a file (typically a mounted
 * container secret) whose contents become the value.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ConfigurationConflict, InvalidConfiguration, errorMessage } from "../lib/errors";

/** Mutable view of an environment; `process.env` in production. */
export type EnvRecord = Record<string, string | undefined>;

export const fileVariable = (name: string): string => `${name}_FILE`;

/** Shell semantics: an empty variable counts as unset. */
const nonEmpty = (env: EnvRecord, name: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(env[name]),
    Option.filter((value) => value !== "")
  );

const readSecretFile = (
  fileVar: string,
  path: string
): Effect.Effect<string, InvalidConfiguration, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const content = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (e) =>
          new InvalidConfiguration({
            message: `Cannot read ${fileVar} (${path}): ${errorMessage(e)}`,
          })
      )
    );
    return content.trim();
  });

/**
 * Resolve `name` from the direct value, else the `_FILE` contents (trimmed),
 * else `defaultValue`. The `_FILE` variable is removed from `env` afterwards
 * so it never reaches child processes.
 */
export const resolveSecret = (
  env: EnvRecord,
  name: string,
  defaultValue?: string
): Effect.Effect<
  Option.Option<string>,
  ConfigurationConflict | InvalidConfiguration,
  FileSystem.FileSystem
> => {
  const fileVar = fileVariable(name);
  const direct = nonEmpty(env, name);
  const indirect = nonEmpty(env, fileVar);

  const resolved: Effect.Effect<
    Option.Option<string>,
    ConfigurationConflict | InvalidConfiguration,
    FileSystem.FileSystem
  > =
    Option.isSome(direct) && Option.isSome(indirect)
      ? Effect.fail(
          new ConfigurationConflict({
            message: `Both ${name} and ${fileVar} are set (but are exclusive)`,
            names: [name, fileVar],
          })
        )
      : Option.match(direct, {
          onSome: (value) => Effect.succeed(Option.some(value)),
          onNone: () =>
            Option.match(indirect, {
              onSome: (path) => Effect.map(readSecretFile(fileVar, path), Option.some),
              onNone: () => Effect.succeed(Option.fromNullable(defaultValue)),
            }),
        });

  return resolved.pipe(
    Effect.ensuring(
      Effect.sync(() => {
        delete env[fileVar];
      })
    )
  );
};
