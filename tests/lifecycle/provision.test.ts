// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  createDatabase,
  createUser,
  createUserStatements,
  loadTimezones,
  normalizeTzinfo,
} from "../../src/lifecycle/provision";
import { exited, makeFakeSupervisor, ok, stdinText } from "../helpers/fake-supervisor";
import { runTest, runTestExit } from "../helpers/layers";
import { baseSettings } from "../helpers/fixtures";

const CLIENT = [
  "mysql",
  "--protocol=socket",
  "-uroot",
  "-hlocalhost",
  "--socket=/run/test.sock",
] as const;
const CLIENT_MYSQL_DB = [...CLIENT, "mysql"] as const;

const inputs = (fake: ReturnType<typeof makeFakeSupervisor>): readonly string[] =>
  fake.runs.map(stdinText);

describe("normalizeTzinfo", () => {
  test("replaces the benign warning line", () => {
    expect(
      normalizeTzinfo("a\nLocal time zone must be set--see zic manual page\nb")
    ).toBe("a\nFCTY\nb");
  });

  test("leaves other text alone", () => {
    expect(normalizeTzinfo("INSERT INTO time_zone VALUES (1);")).toBe(
      "INSERT INTO time_zone VALUES (1);"
    );
  });
});

describe("loadTimezones", () => {
  test("converts the zoneinfo tree and loads it into the system database", async () => {
    const fake = makeFakeSupervisor({
      run: (argv) =>
        argv[0] === "mysql_tzinfo_to_sql"
          ? ok("Local time zone must be set--see zic manual page\nINSERT 1;\n")
          : undefined,
    });
    await runTest(
      loadTimezones("mysql_tzinfo_to_sql", "/usr/share/zoneinfo", CLIENT_MYSQL_DB).pipe(
        Effect.provide(fake.layer)
      )
    );

    expect(fake.runs.map((run) => run.argv)).toEqual([
      ["mysql_tzinfo_to_sql", "/usr/share/zoneinfo"],
      CLIENT_MYSQL_DB,
    ]);
    expect(inputs(fake)[1]).toBe("FCTY\nINSERT 1;\n");
  });

  test("a failing converter is ProvisioningFailed", async () => {
    const fake = makeFakeSupervisor({ run: () => exited(2, "no such directory") });
    const exit = await runTestExit(
      loadTimezones("mysql_tzinfo_to_sql", "/missing", CLIENT_MYSQL_DB).pipe(
        Effect.provide(fake.layer)
      )
    );
    const error = Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
    expect(Option.map(error, (e) => e.step)).toEqual(Option.some("timezones"));
    expect(fake.runs).toHaveLength(1);
  });
});

describe("createDatabase", () => {
  test("creates the configured database if missing", async () => {
    const fake = makeFakeSupervisor();
    await runTest(
      createDatabase(baseSettings({ database: Option.some("appdb") }), CLIENT).pipe(
        Effect.provide(fake.layer)
      )
    );
    expect(inputs(fake)).toEqual(["CREATE DATABASE IF NOT EXISTS `appdb`;\n"]);
  });

  test("does nothing without a database", async () => {
    const fake = makeFakeSupervisor();
    await runTest(createDatabase(baseSettings(), CLIENT).pipe(Effect.provide(fake.layer)));
    expect(fake.runs).toHaveLength(0);
  });
});

describe("createUser", () => {
  test("user, grant on the database and flush", async () => {
    const fake = makeFakeSupervisor();
    await runTest(
      createUser(
        baseSettings({
          user: Option.some("app"),
          password: Option.some("test-secret"),
          database: Option.some("appdb"),
        }),
        CLIENT
      ).pipe(Effect.provide(fake.layer))
    );
    expect(inputs(fake)).toEqual([
      [
        "CREATE USER IF NOT EXISTS 'app'@'%' IDENTIFIED BY 'test-secret';",
        "GRANT ALL ON `appdb`.* TO 'app'@'%';",
        "FLUSH PRIVILEGES;",
        "",
      ].join("\n"),
    ]);
  });

  test("no grant without a database", () => {
    expect(createUserStatements("app", "test-secret", Option.none())).toBe(
      "CREATE USER IF NOT EXISTS 'app'@'%' IDENTIFIED BY 'test-secret';\nFLUSH PRIVILEGES;\n"
    );
  });

  test("skipped when only one of user and password is set", async () => {
    const fake = makeFakeSupervisor();
    await runTest(
      createUser(baseSettings({ user: Option.some("app") }), CLIENT).pipe(
        Effect.provide(fake.layer)
      )
    );
    expect(fake.runs).toHaveLength(0);
  });

  test("a client failure is ProvisioningFailed", async () => {
    const fake = makeFakeSupervisor({ run: () => exited(1, "ERROR 1396") });
    const exit = await runTestExit(
      createUser(
        baseSettings({ user: Option.some("app"), password: Option.some("test-secret") }),
        CLIENT
      ).pipe(Effect.provide(fake.layer))
    );
    const error = Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
    expect(Option.map(error, (e) => e.step)).toEqual(Option.some("user"));
  });
});
