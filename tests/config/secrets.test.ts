// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { Cause, Exit, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { type EnvRecord, resolveSecret } from "../../src/config/secrets";
import { makeTempDir, removeDir, runTest, runTestExit } from "../helpers/layers";

describe("resolveSecret", () => {
  let dir: string;
  let secretFile: string;

  beforeAll(() => {
    dir = makeTempDir("secrets");
    secretFile = join(dir, "password");
    writeFileSync(secretFile, "  test-secret\n");
  });

  afterAll(() => {
    removeDir(dir);
  });

  test("direct value wins and is used verbatim", async () => {
    const env: EnvRecord = { MYSQL_PASSWORD: " spaced " };
    const value = await runTest(resolveSecret(env, "MYSQL_PASSWORD"));
    expect(value).toEqual(Option.some(" spaced "));
  });

  test("file indirection yields the trimmed file content", async () => {
    const env: EnvRecord = { MYSQL_PASSWORD_FILE: secretFile };
    const value = await runTest(resolveSecret(env, "MYSQL_PASSWORD"));
    expect(value).toEqual(Option.some("test-secret"));
  });

  test("neither set yields the default", async () => {
    const value = await runTest(resolveSecret({}, "MYSQL_ROOT_HOST", "%"));
    expect(value).toEqual(Option.some("%"));
  });

  test("neither set and no default yields None", async () => {
    const value = await runTest(resolveSecret({}, "MYSQL_USER"));
    expect(Option.isNone(value)).toBe(true);
  });

  test("empty values count as unset", async () => {
    const env: EnvRecord = { MYSQL_USER: "", MYSQL_USER_FILE: "" };
    const value = await runTest(resolveSecret(env, "MYSQL_USER", "fallback"));
    expect(value).toEqual(Option.some("fallback"));
  });

  test("both forms set is a ConfigurationConflict naming both", async () => {
    const env: EnvRecord = { MYSQL_PASSWORD: "test-secret", MYSQL_PASSWORD_FILE: secretFile };
    const exit = await runTestExit(resolveSecret(env, "MYSQL_PASSWORD"));

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      const error = Cause.failureOption(exit.cause);
      expect(Option.isSome(error)).toBe(true);
      if (Option.isSome(error)) {
        expect(error.value._tag).toBe("ConfigurationConflict");
        expect(error.value.message).toBe(
          "Both MYSQL_PASSWORD and MYSQL_PASSWORD_FILE are set (but are exclusive)"
        );
      }
    }
  });

  test("the _FILE variable is removed after resolution", async () => {
    const env: EnvRecord = { MYSQL_DATABASE_FILE: secretFile };
    await runTest(resolveSecret(env, "MYSQL_DATABASE"));
    expect("MYSQL_DATABASE_FILE" in env).toBe(false);
  });

  test("the _FILE variable is removed even on conflict", async () => {
    const env: EnvRecord = { MYSQL_USER: "app", MYSQL_USER_FILE: secretFile };
    await runTestExit(resolveSecret(env, "MYSQL_USER"));
    expect("MYSQL_USER_FILE" in env).toBe(false);
    expect(env["MYSQL_USER"]).toBe("app");
  });

  test("an unreadable file is InvalidConfiguration", async () => {
    const env: EnvRecord = { MYSQL_PASSWORD_FILE: join(dir, "missing") };
    const exit = await runTestExit(resolveSecret(env, "MYSQL_PASSWORD"));
    const error = Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
    const path = join(dir, "missing");
    expect(Option.map(error, (e) => [e._tag, e.message])).toEqual(
      Option.some([
        "InvalidConfiguration",
        `Cannot read MYSQL_PASSWORD_FILE (${path}): ENOENT: no such file or directory, open '${path}'`,
      ])
    );
  });
});
