// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Duration, Effect, Exit } from "effect";
import { describe, expect, test } from "vitest";
import { EntrypointConfigSpec, createTestConfigProvider } from "../../src/config/env";

const load = (overrides: Record<string, string>) =>
  Effect.runPromiseExit(
    Effect.withConfigProvider(
      Effect.gen(function* () {
        return yield* EntrypointConfigSpec;
      }),
      createTestConfigProvider(overrides)
    )
  );

describe("EntrypointConfigSpec", () => {
  test("defaults", async () => {
    const exit = await load({});
    expect(Exit.isSuccess(exit)).toBe(true);
    if (Exit.isSuccess(exit)) {
      const config = exit.value;
      expect(config.product).toBe("mysql-wsrep");
      expect(config.logging).toEqual({ level: "info", format: "pretty" });
      expect(config.paths).toEqual({
        initDbDir: "/codership-initdb.d",
        confDir: "/etc/mysql/conf.d",
        zoneinfoDir: "/usr/share/zoneinfo",
      });
      expect(config.binaries).toEqual({
        server: "mysqld",
        client: "mysql",
        tzinfo: "mysql_tzinfo_to_sql",
        recover: "wsrep_recover",
        shell: "bash",
      });
      expect(Duration.toMillis(config.timing.readinessInterval)).toBe(1000);
      expect(Duration.toMillis(config.timing.stopTimeout)).toBe(120_000);
    }
  });

  test("overrides from the ENTRYPOINT_ namespace", async () => {
    const exit = await load({
      PRODUCT: "test-product",
      LOG_FORMAT: "json",
      SERVER: "/opt/bin/mysqld",
      READINESS_INTERVAL: "250 millis",
    });
    expect(Exit.isSuccess(exit)).toBe(true);
    if (Exit.isSuccess(exit)) {
      expect(exit.value.product).toBe("test-product");
      expect(exit.value.logging.format).toBe("json");
      expect(exit.value.binaries.server).toBe("/opt/bin/mysqld");
      expect(Duration.toMillis(exit.value.timing.readinessInterval)).toBe(250);
    }
  });

  test("DEBUG forces the debug level", async () => {
    const exit = await load({ DEBUG: "true", LOG_LEVEL: "error" });
    expect(Exit.isSuccess(exit)).toBe(true);
    if (Exit.isSuccess(exit)) {
      expect(exit.value.logging.level).toBe("debug");
    }
  });

  test("rejects an unknown log level", async () => {
    const exit = await load({ LOG_LEVEL: "verbose" });
    expect(Exit.isFailure(exit)).toBe(true);
  });
});
