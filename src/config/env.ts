// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for the entrypoint's own settings.
 *
 * This module follows "functional core, imperative shell" philosophy:
 * - All exports are pure Config<A> values (no effects executed)
 * - Configs are composed using combinators (all, map, nested, withDefault)
 * - Effects are only yielded at the application boundary (CLI)
 *
 * Database inputs (MYSQL_*, WSREP_JOIN) are not here: they go through the
 * secret resolver in ./settings because each may be redirected to a file.
 */

import { Config, ConfigProvider, Duration } from "effect";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

// ============================================================================
// Type Definitions (Pure Data)
// ============================================================================

export interface EntrypointConfig {
  /** Product label used in progress messages. */
  readonly product: string;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly paths: {
    readonly initDbDir: string;
    readonly confDir: string;
    readonly zoneinfoDir: string;
  };
  readonly binaries: {
    readonly server: string;
    readonly client: string;
    readonly tzinfo: string;
    readonly recover: string;
    /** Interpreter for `*.sh` init scripts. */
    readonly shell: string;
  };
  readonly timing: {
    readonly readinessInterval: Duration.Duration;
    readonly stopTimeout: Duration.Duration;
  };
}

const NAMESPACE = "ENTRYPOINT";

const namespaced = <A>(config: Config.Config<A>): Config.Config<A> =>
  Config.nested(config, NAMESPACE);

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

export const LogLevelConfig: Config.Config<LogLevel> = namespaced(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.withDefault(LOG_LEVEL_DEFAULT))
);

export const LogFormatConfig: Config.Config<LogFormat> = namespaced(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.withDefault(LOG_FORMAT_DEFAULT))
);

/**
 * Debug mode flag. When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = namespaced(
  Config.boolean("DEBUG").pipe(Config.withDefault(false))
);

export const ProductConfig: Config.Config<string> = namespaced(
  Config.string("PRODUCT").pipe(Config.withDefault("mysql-wsrep"))
);

export const InitDbDirConfig: Config.Config<string> = namespaced(
  Config.string("INITDB_DIR").pipe(Config.withDefault("/codership-initdb.d"))
);

export const ConfDirConfig: Config.Config<string> = namespaced(
  Config.string("CONF_DIR").pipe(Config.withDefault("/etc/mysql/conf.d"))
);

export const ZoneinfoDirConfig: Config.Config<string> = namespaced(
  Config.string("ZONEINFO_DIR").pipe(Config.withDefault("/usr/share/zoneinfo"))
);

export const ServerBinaryConfig: Config.Config<string> = namespaced(
  Config.string("SERVER").pipe(Config.withDefault("mysqld"))
);

export const ClientBinaryConfig: Config.Config<string> = namespaced(
  Config.string("CLIENT").pipe(Config.withDefault("mysql"))
);

export const TzinfoToolConfig: Config.Config<string> = namespaced(
  Config.string("TZINFO_TOOL").pipe(Config.withDefault("mysql_tzinfo_to_sql"))
);

export const RecoverToolConfig: Config.Config<string> = namespaced(
  Config.string("RECOVER_TOOL").pipe(Config.withDefault("wsrep_recover"))
);

export const ShellConfig: Config.Config<string> = namespaced(
  Config.string("SHELL").pipe(Config.withDefault("bash"))
);

export const ReadinessIntervalConfig: Config.Config<Duration.Duration> = namespaced(
  Config.duration("READINESS_INTERVAL").pipe(Config.withDefault(Duration.seconds(1)))
);

export const StopTimeoutConfig: Config.Config<Duration.Duration> = namespaced(
  Config.duration("STOP_TIMEOUT").pipe(Config.withDefault(Duration.minutes(2)))
);

// ============================================================================
// Composite Config (Pure Transformation)
// ============================================================================

export const EntrypointConfigSpec: Config.Config<EntrypointConfig> = Config.all({
  product: ProductConfig,
  logLevel: LogLevelConfig,
  logFormat: LogFormatConfig,
  debug: DebugModeConfig,
  initDbDir: InitDbDirConfig,
  confDir: ConfDirConfig,
  zoneinfoDir: ZoneinfoDirConfig,
  server: ServerBinaryConfig,
  client: ClientBinaryConfig,
  tzinfo: TzinfoToolConfig,
  recover: RecoverToolConfig,
  shell: ShellConfig,
  readinessInterval: ReadinessIntervalConfig,
  stopTimeout: StopTimeoutConfig,
}).pipe(
  Config.map(
    (c): EntrypointConfig => ({
      product: c.product,
      logging: {
        level: c.debug ? "debug" : c.logLevel,
        format: c.logFormat,
      },
      paths: {
        initDbDir: c.initDbDir,
        confDir: c.confDir,
        zoneinfoDir: c.zoneinfoDir,
      },
      binaries: {
        server: c.server,
        client: c.client,
        tzinfo: c.tzinfo,
        recover: c.recover,
        shell: c.shell,
      },
      timing: {
        readinessInterval: c.readinessInterval,
        stopTimeout: c.stopTimeout,
      },
    })
  )
);

// ============================================================================
// Test Utilities (Pure Functions)
// ============================================================================

/**
 * Create a ConfigProvider for testing from unprefixed keys.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ LOG_LEVEL: "debug" });
 * const config = await Effect.runPromise(
 *   Effect.withConfigProvider(EntrypointConfigSpec, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(Object.entries(overrides).map(([key, value]) => [`${NAMESPACE}_${key}`, value])),
    { pathDelim: "_" }
  );
