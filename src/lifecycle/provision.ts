// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Idempotent provisioning statements run against the setup instance.
 */

import { Effect, Option } from "effect";
import { ProvisioningFailed } from "../lib/errors";
import type { Argv } from "../lib/types";
import { describeFailure, isSuccess } from "../system/exec";
import { ProcessSupervisor } from "../system/services/supervisor";
import type { NodeSettings } from "../config/settings";
import { executeSql } from "./client";
import { account, quoteIdentifier, quoteString } from "./sql";

/** The converter emits this for the zone file named `Local`; it is harmless. */
const BENIGN_TZINFO_LINE = "Local time zone must be set--see zic manual page";
const BENIGN_TZINFO_REPLACEMENT = "FCTY";

export const normalizeTzinfo = (sql: string): string =>
  sql.split(BENIGN_TZINFO_LINE).join(BENIGN_TZINFO_REPLACEMENT);

/**
 * Convert the zoneinfo tree to SQL and load it into the system database.
 * `client` must already target that database.
 */
export const loadTimezones = (
  tool: string,
  zoneinfoDir: string,
  client: Argv
): Effect.Effect<void, ProvisioningFailed, ProcessSupervisor> =>
  Effect.gen(function* () {
    const step = "timezones";
    const supervisor = yield* ProcessSupervisor;
    const argv: Argv = [tool, zoneinfoDir];
    const result = yield* supervisor
      .run(argv)
      .pipe(Effect.mapError((e) => new ProvisioningFailed({ message: e.message, step })));
    if (!isSuccess(result)) {
      return yield* Effect.fail(
        new ProvisioningFailed({ message: describeFailure(argv, result), step })
      );
    }
    yield* executeSql(client, normalizeTzinfo(result.stdout), step);
  });

export const createDatabaseStatement = (database: string): string =>
  `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(database)};\n`;

export const createDatabase = (
  settings: NodeSettings,
  client: Argv
): Effect.Effect<void, ProvisioningFailed, ProcessSupervisor> =>
  Option.match(settings.database, {
    onNone: () => Effect.logDebug("No database configured"),
    onSome: (database) =>
      Effect.zipRight(
        Effect.log(`Creating database ${database}`),
        executeSql(client, createDatabaseStatement(database), "database")
      ),
  });

export const createUserStatements = (
  user: string,
  password: string,
  database: Option.Option<string>
): string =>
  [
    `CREATE USER IF NOT EXISTS ${account(user, "%")} IDENTIFIED BY ${quoteString(password)};`,
    ...Option.toArray(
      Option.map(
        database,
        (db) => `GRANT ALL ON ${quoteIdentifier(db)}.* TO ${account(user, "%")};`
      )
    ),
    "FLUSH PRIVILEGES;",
    "",
  ].join("\n");

export const createUser = (
  settings: NodeSettings,
  client: Argv
): Effect.Effect<void, ProvisioningFailed, ProcessSupervisor> =>
  Option.match(Option.all([settings.user, settings.password]), {
    onNone: () =>
      Effect.log(
        "Skipping MYSQL user creation, both MYSQL_USER and MYSQL_PASSWORD must be set"
      ),
    onSome: ([user, password]) =>
      Effect.gen(function* () {
        yield* Effect.log(`Creating user ${user} with password set`);
        if (Option.isSome(settings.database)) {
          yield* Effect.log(`Giving all privileges on ${settings.database.value} to ${user}...`);
        }
        yield* executeSql(client, createUserStatements(user, password, settings.database), "user");
      }),
  });
