// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom init directory, run once per initialization in name order.
 *
 * Shell scripts run as separate processes of the configured shell. They see
 * the resolved configuration in their environment and can hand values back
 * by writing `KEY=VALUE` lines to the file named by ENTRYPOINT_OVERRIDES_FILE.
 * Only the root account keys are accepted; later scripts and the root account
 * step see the result.
 */

import { FileSystem } from "@effect/platform";
import { Data, Effect, Match, Option, pipe } from "effect";
import { ProvisioningFailed, type SystemError, errorMessage } from "../lib/errors";
import { gunzip } from "../system/compress";
import { describeFailure } from "../system/exec";
import { directoryExists, listDirectory, readBytes, readText } from "../system/fs";
import { ProcessSupervisor } from "../system/services/supervisor";
import { type AbsolutePath, type Argv, formatArgv, pathJoin } from "../lib/types";
import { type NodeSettings, parseRootPassword } from "../config/settings";
import { executeSql } from "./client";

// ============================================================================
// Script kinds
// ============================================================================

export type InitScript = Data.TaggedEnum<{
  Shell: { readonly path: AbsolutePath };
  Sql: { readonly path: AbsolutePath };
  CompressedSql: { readonly path: AbsolutePath };
  Ignored: { readonly path: AbsolutePath };
}>;

export const InitScript = Data.taggedEnum<InitScript>();

export const classifyScript = (path: AbsolutePath): InitScript =>
  pipe(
    Match.value(path),
    Match.when(
      (p) => p.endsWith(".sh"),
      () => InitScript.Shell({ path })
    ),
    Match.when(
      (p) => p.endsWith(".sql.gz"),
      () => InitScript.CompressedSql({ path })
    ),
    Match.when(
      (p) => p.endsWith(".sql"),
      () => InitScript.Sql({ path })
    ),
    Match.orElse(() => InitScript.Ignored({ path }))
  );

// ============================================================================
// Override channel
// ============================================================================

export const OVERRIDE_KEYS = [
  "MYSQL_ROOT_PASSWORD",
  "MYSQL_ROOT_HOST",
  "MYSQL_ONETIME_PASSWORD",
] as const;

export type OverrideKey = (typeof OVERRIDE_KEYS)[number];

export type Overrides = Readonly<Partial<Record<OverrideKey, string>>>;

export const OVERRIDES_FILE_VARIABLE = "ENTRYPOINT_OVERRIDES_FILE";

const isOverrideKey = (key: string): key is OverrideKey =>
  OVERRIDE_KEYS.some((allowed) => allowed === key);

export interface ParsedOverrides {
  readonly overrides: Overrides;
  /** Keys that were written but are not accepted. */
  readonly rejected: readonly string[];
}

/**
 * Blank lines and `#` comments are skipped. Each line is trimmed; the value
 * is everything after its first `=`. A later line for the same key wins.
 */
export const parseOverrides = (content: string): ParsedOverrides =>
  content.split("\n").reduce<ParsedOverrides>(
    (acc, raw) => {
      const line = raw.trim();
      const eq = line.indexOf("=");
      if (line === "" || line.startsWith("#") || eq <= 0) {
        return acc;
      }
      const key = line.slice(0, eq).trim();
      const value = line.slice(eq + 1);
      return isOverrideKey(key)
        ? { ...acc, overrides: { ...acc.overrides, [key]: value } }
        : { ...acc, rejected: [...acc.rejected, key] };
    },
    { overrides: {}, rejected: [] }
  );

/** Settings as the root account step should see them after the overrides. */
export const applyOverrides = (settings: NodeSettings, overrides: Overrides): NodeSettings => ({
  ...settings,
  rootPassword:
    overrides.MYSQL_ROOT_PASSWORD !== undefined
      ? parseRootPassword(overrides.MYSQL_ROOT_PASSWORD)
      : settings.rootPassword,
  rootHost: overrides.MYSQL_ROOT_HOST ?? settings.rootHost,
  expireRootPassword:
    overrides.MYSQL_ONETIME_PASSWORD !== undefined
      ? overrides.MYSQL_ONETIME_PASSWORD !== ""
      : settings.expireRootPassword,
});

// ============================================================================
// Execution
// ============================================================================

export interface ScriptContext {
  readonly settings: NodeSettings;
  readonly client: Argv;
  readonly socket: string;
  readonly dataDir: string;
  readonly shell: string;
}

export const scriptEnvironment = (
  context: ScriptContext,
  overrides: Overrides,
  overridesFile: string
): Record<string, string> => ({
  MYSQL_DATABASE: Option.getOrElse(context.settings.database, () => ""),
  MYSQL_USER: Option.getOrElse(context.settings.user, () => ""),
  MYSQL_PASSWORD: Option.getOrElse(context.settings.password, () => ""),
  MYSQL_ROOT_HOST: context.settings.rootHost,
  MYSQL_SOCKET: context.socket,
  MYSQL_CLIENT: formatArgv(context.client),
  DATADIR: context.dataDir,
  ...overrides,
  [OVERRIDES_FILE_VARIABLE]: overridesFile,
});

type ScriptError = ProvisioningFailed | SystemError;

const runShellScript = (
  path: AbsolutePath,
  context: ScriptContext,
  overrides: Overrides
): Effect.Effect<Overrides, ScriptError, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const supervisor = yield* ProcessSupervisor;
      const overridesFile = yield* fs.makeTempFileScoped({ prefix: "entrypoint-overrides-" }).pipe(
        Effect.mapError(
          (e) =>
            new ProvisioningFailed({
              message: `Cannot create overrides file for ${path}: ${errorMessage(e)}`,
              step: path,
            })
        )
      );

      const argv: Argv = [context.shell, path];
      const result = yield* supervisor.run(argv, {
        env: scriptEnvironment(context, overrides, overridesFile),
      });
      if (result.stdout.trim() !== "") {
        yield* Effect.log(result.stdout.trimEnd());
      }
      if (result.exitCode !== 0) {
        return yield* Effect.fail(
          new ProvisioningFailed({ message: describeFailure(argv, result), step: path })
        );
      }

      const parsed = parseOverrides(yield* readText(overridesFile));
      yield* Effect.forEach(
        parsed.rejected,
        (key) => Effect.logWarning(`Ignoring override ${key} from ${path}: not an accepted key`),
        { discard: true }
      );
      return { ...overrides, ...parsed.overrides };
    })
  );

const runScript = (
  script: InitScript,
  context: ScriptContext,
  overrides: Overrides
): Effect.Effect<Overrides, ScriptError, ProcessSupervisor | FileSystem.FileSystem> =>
  pipe(
    Match.value(script),
    Match.tagsExhaustive({
      Shell: ({ path }) =>
        Effect.zipRight(
          Effect.log(`Running shell script ${path}`),
          runShellScript(path, context, overrides)
        ),
      Sql: ({ path }) =>
        Effect.gen(function* () {
          yield* Effect.log(`Running SQL file ${path}`);
          const sql = yield* readBytes(path);
          yield* executeSql(context.client, sql, path);
          return overrides;
        }),
      CompressedSql: ({ path }) =>
        Effect.gen(function* () {
          yield* Effect.log(`Running compressed SQL file ${path}`);
          const sql = yield* Effect.flatMap(readBytes(path), gunzip);
          yield* executeSql(context.client, sql, path);
          return overrides;
        }),
      Ignored: ({ path }) => Effect.as(Effect.log(`Ignoring ${path}`), overrides),
    })
  );

/**
 * Run every entry of `dir` in order and return the accumulated overrides.
 * A missing directory has nothing to run.
 */
export const runInitScripts = (
  dir: AbsolutePath,
  context: ScriptContext
): Effect.Effect<Overrides, ScriptError, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(dir))) {
      yield* Effect.logDebug(`No init directory at ${dir}`);
      return {};
    }
    const names = yield* listDirectory(dir);
    const initial: Overrides = {};
    return yield* Effect.reduce(names, initial, (overrides, name) =>
      runScript(classifyScript(pathJoin(dir, name)), context, overrides)
    );
  });
