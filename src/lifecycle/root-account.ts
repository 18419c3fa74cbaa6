// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Root account setup: the last provisioning step, executed as one batch in a
 * single client session with binary logging off.
 */

import { Effect, Match, Option, pipe } from "effect";
import { InvalidConfiguration, type ProvisioningFailed } from "../lib/errors";
import { generatePassword } from "../lib/crypto";
import { writeOutput } from "../lib/log";
import type { Argv } from "../lib/types";
import type { ProcessSupervisor } from "../system/services/supervisor";
import type { NodeSettings, RootPassword } from "../config/settings";
import { executeSql } from "./client";
import { account, quoteString } from "./sql";

export const missingRootPassword = (): InvalidConfiguration =>
  new InvalidConfiguration({
    message:
      "Database is uninitialized and password option is not specified. " +
      "You need to specify one of MYSQL_ROOT_PASSWORD, MYSQL_ALLOW_EMPTY_PASSWORD " +
      "and MYSQL_RANDOM_ROOT_PASSWORD",
  });

/**
 * The password to set, or None when the empty password was acknowledged.
 * A random password is printed once to stdout and kept nowhere.
 */
export const resolveRootCredential = (
  rootPassword: RootPassword
): Effect.Effect<Option.Option<string>, InvalidConfiguration> =>
  pipe(
    Match.value(rootPassword),
    Match.tagsExhaustive({
      Literal: ({ value }) => Effect.succeed(Option.some(value)),
      Random: () => {
        const password = generatePassword();
        return Effect.as(
          writeOutput(`GENERATED ROOT PASSWORD: ${password}`),
          Option.some(password)
        );
      },
      Empty: () =>
        Effect.as(
          Effect.zipRight(
            Effect.logWarning("=-> Warning! Warning! Warning!"),
            Effect.logWarning("EMPTY password is specified for image, your container is insecure!!!")
          ),
          Option.none()
        ),
      Unspecified: () => Effect.fail(missingRootPassword()),
    })
  );

export interface RootSetupOptions {
  /** None means the empty password. */
  readonly password: Option.Option<string>;
  readonly rootHost: string;
  readonly expireRootPassword: boolean;
}

const LOCAL_HOST = "localhost";

/** Whether a separate root account is created for `rootHost`. */
export const hasRemoteRoot = (rootHost: string): boolean =>
  rootHost !== "" && rootHost !== LOCAL_HOST;

/** Statement batch; always opens with the binlog switch and ends with the flush. */
export const buildRootSetupBatch = (options: RootSetupOptions): string => {
  const secret = quoteString(Option.getOrElse(options.password, () => ""));
  const remote = account("root", options.rootHost);
  const local = account("root", LOCAL_HOST);

  const remoteStatements = hasRemoteRoot(options.rootHost)
    ? [
        `CREATE USER IF NOT EXISTS ${remote} IDENTIFIED BY ${secret};`,
        `GRANT ALL ON *.* TO ${remote} WITH GRANT OPTION;`,
        ...(options.expireRootPassword ? [`ALTER USER ${remote} PASSWORD EXPIRE;`] : []),
      ]
    : [];

  const localStatements = Option.isSome(options.password)
    ? [
        `GRANT ALL ON *.* TO ${local} WITH GRANT OPTION;`,
        `ALTER USER ${local} IDENTIFIED BY ${secret};`,
      ]
    : [];

  return [
    "SET @@SESSION.SQL_LOG_BIN=0;",
    ...remoteStatements,
    ...localStatements,
    "FLUSH PRIVILEGES;",
    "",
  ].join("\n");
};

export const setupRootAccount = (
  settings: NodeSettings,
  client: Argv
): Effect.Effect<void, InvalidConfiguration | ProvisioningFailed, ProcessSupervisor> =>
  Effect.gen(function* () {
    const password = yield* resolveRootCredential(settings.rootPassword);
    if (Option.isSome(password)) {
      yield* Effect.log("ROOT password has been specified for image, updating account...");
    }
    const batch = buildRootSetupBatch({
      password,
      rootHost: settings.rootHost,
      expireRootPassword: settings.expireRootPassword,
    });
    yield* executeSql(client, batch, "root account");
  });
