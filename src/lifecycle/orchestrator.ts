// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Container start, end to end:
 *
 *   settings -> drop-ins -> validate -> layout -> classify
 *     -> (join) handoff
 *     -> (bootstrap/normal) initialize? -> setup? -> handoff
 *
 * Every failure is reported with diagnostics before it propagates. Until the
 * data directory is known the report goes without its listing and error log.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { EntrypointConfig } from "../config/env";
import type { EnvRecord } from "../config/secrets";
import { type NodeSettings, loadNodeSettings } from "../config/settings";
import type { EntrypointError } from "../lib/errors";
import {
  type Argv,
  appendArgs,
  formatArgv,
  stripTrailingSlash,
  toAbsolutePath,
} from "../lib/types";
import type { ProcessSupervisor } from "../system/services/supervisor";
import { classify, joinsCluster, modeArguments } from "./classify";
import { reportDiagnostics } from "./diagnostics";
import { installDropIns } from "./drop-ins";
import { handoff } from "./handoff";
import { initializeDataStore } from "./initialize";
import { requireEffectiveValue, validateConfiguration } from "./introspect";
import { type DataLayout, dataLayout, hasNodeMarker } from "./layout";
import { runSetup } from "./setup";

type Requirements = ProcessSupervisor | FileSystem.FileSystem;

interface Prepared {
  readonly settings: NodeSettings;
  readonly layout: DataLayout;
}

const prepare = (
  argv: Argv,
  config: EntrypointConfig,
  env: EnvRecord
): Effect.Effect<Prepared, EntrypointError, Requirements> =>
  Effect.gen(function* () {
    yield* Effect.log(`Preparing ${config.product}...`);
    const settings = yield* loadNodeSettings(env);
    yield* installDropIns(config.paths.initDbDir, config.paths.confDir);

    yield* Effect.log("Validating configuration...");
    yield* validateConfiguration(argv);
    const dataDir = yield* requireEffectiveValue(argv, "datadir").pipe(
      Effect.flatMap((value) => toAbsolutePath(stripTrailingSlash(value), "datadir"))
    );
    return { settings, layout: dataLayout(dataDir) };
  }).pipe(Effect.annotateLogs("phase", "prepare"));

const launch = (
  argv: Argv,
  config: EntrypointConfig,
  { settings, layout }: Prepared
): Effect.Effect<never, EntrypointError, Requirements> =>
  Effect.gen(function* () {
    // The error log lives on the persistent volume.
    const baseArgv = appendArgs(argv, `--log-error=${layout.errorLog}`);

    const mode = classify(settings.joinAddress, yield* hasNodeMarker(layout));
    yield* Effect.log(`Bootstrap mode: ${mode._tag}`);
    const modeArgs = yield* modeArguments(mode, config.binaries.recover);
    const finalArgv = appendArgs(baseArgv, ...modeArgs);

    if (!joinsCluster(mode)) {
      const initialized = yield* initializeDataStore(baseArgv, layout, settings.rootPassword);
      if (initialized) {
        const socket = yield* requireEffectiveValue(baseArgv, "socket");
        yield* runSetup({ argv: baseArgv, socket, layout, settings, config });
      }
    }

    yield* Effect.log(`${config.product} is starting!`);
    yield* Effect.logDebug(`Final invocation: ${formatArgv(finalArgv)}`);
    return yield* handoff(finalArgv);
  }).pipe(Effect.annotateLogs("phase", "launch"));

/**
 * Runs the whole start sequence for `argv` (the server invocation). `env`
 * supplies the database inputs and loses its `_FILE` variables on the way.
 */
export const runEntrypoint = (
  argv: Argv,
  config: EntrypointConfig,
  env: EnvRecord
): Effect.Effect<never, EntrypointError, Requirements> =>
  Effect.gen(function* () {
    const prepared = yield* prepare(argv, config, env).pipe(
      Effect.tapError((error) => reportDiagnostics(error, Option.none()))
    );
    return yield* launch(argv, config, prepared).pipe(
      Effect.tapError((error) => reportDiagnostics(error, Option.some(prepared.layout)))
    );
  });
