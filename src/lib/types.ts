// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A data directory and a socket path are both strings, but only one of
 * them may be handed to a function expecting an `AbsolutePath`.
 */

import { posix } from "node:path";
import { type Brand, Effect, Schema } from "effect";
import { InvalidConfiguration } from "./errors";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

/** Validates at the boundary; `what` names the value in the error. */
export const toAbsolutePath = (
  value: string,
  what: string
): Effect.Effect<AbsolutePath, InvalidConfiguration> =>
  Schema.decodeUnknown(AbsolutePathSchema)(value).pipe(
    Effect.mapError(
      () =>
        new InvalidConfiguration({
          message: `${what} must be an absolute path, got "${value}"`,
        })
    )
  );

/** Joining onto an absolute path keeps it absolute. */
export const pathJoin = (base: AbsolutePath, ...segments: readonly string[]): AbsolutePath =>
  Schema.decodeSync(AbsolutePathSchema)(posix.join(base, ...segments));

/** Drops trailing slashes, keeping the root itself. */
export const stripTrailingSlash = (value: string): string => {
  const stripped = value.replace(/\/+$/, "");
  return stripped === "" && value.startsWith("/") ? "/" : stripped;
};

/**
 * Program invocation: the binary followed by its arguments.
 * The non-empty tuple rules out spawning nothing.
 */
export type Argv = readonly [string, ...string[]];

export const appendArgs = (argv: Argv, ...extra: readonly string[]): Argv => [
  argv[0],
  ...argv.slice(1),
  ...extra,
];

export const formatArgv = (argv: readonly string[]): string => argv.join(" ");
