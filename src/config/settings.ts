// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Database inputs, resolved once at startup into an immutable struct.
 * Nothing downstream reads the environment directly.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect, Match, Option, pipe } from "effect";
import type { ConfigurationConflict, InvalidConfiguration } from "../lib/errors";
import { ROOT_PASSWORD_EMPTY, ROOT_PASSWORD_RANDOM, isTruthy } from "./field-values";
import { type EnvRecord, resolveSecret } from "./secrets";

// ============================================================================
// RootPassword ADT
// ============================================================================

/**
 * How the root account gets its password. `Unspecified` only arises from an
 * empty MYSQL_ROOT_PASSWORD_FILE and is rejected before a fresh data store
 * is initialized; an empty MYSQL_ROOT_PASSWORD counts as unset.
 */
export type RootPassword = Data.TaggedEnum<{
  Literal: { readonly value: string };
  Random: object;
  Empty: object;
  Unspecified: object;
}>;

export const RootPassword = Data.taggedEnum<RootPassword>();

/** Interprets a MYSQL_ROOT_PASSWORD value, sentinels included. */
export const parseRootPassword = (value: string): RootPassword =>
  pipe(
    Match.value(value),
    Match.when(ROOT_PASSWORD_RANDOM, () => RootPassword.Random()),
    Match.when(ROOT_PASSWORD_EMPTY, () => RootPassword.Empty()),
    Match.when("", () => RootPassword.Unspecified()),
    Match.orElse((literal) => RootPassword.Literal({ value: literal }))
  );

// ============================================================================
// NodeSettings
// ============================================================================

export interface NodeSettings {
  readonly user: Option.Option<string>;
  readonly password: Option.Option<string>;
  readonly database: Option.Option<string>;
  readonly rootPassword: RootPassword;
  /** Host pattern for the remote root account; empty or `localhost` means none. */
  readonly rootHost: string;
  /** Expire the remote root password so it must be changed on first login. */
  readonly expireRootPassword: boolean;
  readonly loadTimezones: boolean;
  readonly joinAddress: Option.Option<string>;
}

type SettingsError = ConfigurationConflict | InvalidConfiguration;

/**
 * Precedence: MYSQL_RANDOM_ROOT_PASSWORD, then MYSQL_ALLOW_EMPTY_PASSWORD,
 * then the MYSQL_ROOT_PASSWORD value (default RANDOM).
 */
export const selectRootPassword = (options: {
  readonly randomRequested: boolean;
  readonly emptyAllowed: boolean;
  readonly value: Option.Option<string>;
}): RootPassword => {
  if (options.randomRequested) {
    return RootPassword.Random();
  }
  if (options.emptyAllowed) {
    return RootPassword.Empty();
  }
  return parseRootPassword(Option.getOrElse(options.value, () => ""));
};

/**
 * Resolve every database input. Each variable also accepts a `_FILE` form,
 * which is stripped from `env` once read.
 */
export const loadNodeSettings = (
  env: EnvRecord
): Effect.Effect<NodeSettings, SettingsError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const user = yield* resolveSecret(env, "MYSQL_USER");
    const password = yield* resolveSecret(env, "MYSQL_PASSWORD");
    const database = yield* resolveSecret(env, "MYSQL_DATABASE");

    const rootPasswordValue = yield* resolveSecret(
      env,
      "MYSQL_ROOT_PASSWORD",
      ROOT_PASSWORD_RANDOM
    );
    const randomRoot = yield* resolveSecret(env, "MYSQL_RANDOM_ROOT_PASSWORD");
    const allowEmpty = yield* resolveSecret(env, "MYSQL_ALLOW_EMPTY_PASSWORD");

    const rootHost = yield* resolveSecret(env, "MYSQL_ROOT_HOST", "%");
    const onetime = yield* resolveSecret(env, "MYSQL_ONETIME_PASSWORD");
    const tzinfo = yield* resolveSecret(env, "MYSQL_INITDB_TZINFO", "1");
    const skipTzinfo = yield* resolveSecret(env, "MYSQL_INITDB_SKIP_TZINFO");
    const joinAddress = yield* resolveSecret(env, "WSREP_JOIN");

    return {
      user,
      password,
      database,
      rootPassword: selectRootPassword({
        randomRequested: Option.isSome(randomRoot),
        emptyAllowed: Option.exists(allowEmpty, isTruthy),
        value: rootPasswordValue,
      }),
      rootHost: Option.getOrElse(rootHost, () => "%"),
      expireRootPassword: Option.isSome(onetime),
      loadTimezones: Option.exists(tzinfo, isTruthy) && Option.isNone(skipTzinfo),
      joinAddress,
    };
  });
