// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Settings and configuration fixtures.
 */

import { Duration, Option } from "effect";
import type { EntrypointConfig } from "../../src/config/env";
import { type NodeSettings, RootPassword } from "../../src/config/settings";

/** Everything unset except a literal root password. */
export const baseSettings = (overrides: Partial<NodeSettings> = {}): NodeSettings => ({
  user: Option.none(),
  password: Option.none(),
  database: Option.none(),
  rootPassword: RootPassword.Literal({ value: "test-root-secret" }),
  rootHost: "%",
  expireRootPassword: false,
  loadTimezones: false,
  joinAddress: Option.none(),
  ...overrides,
});

export const testConfig = (
  paths: Partial<EntrypointConfig["paths"]> = {}
): EntrypointConfig => ({
  product: "test-product",
  logging: { level: "error", format: "pretty" },
  paths: {
    initDbDir: "/nonexistent/initdb.d",
    confDir: "/nonexistent/conf.d",
    zoneinfoDir: "/usr/share/zoneinfo",
    ...paths,
  },
  binaries: {
    server: "mysqld",
    client: "mysql",
    tzinfo: "mysql_tzinfo_to_sql",
    recover: "wsrep_recover",
    shell: "bash",
  },
  timing: {
    readinessInterval: Duration.seconds(1),
    stopTimeout: Duration.seconds(5),
  },
});
