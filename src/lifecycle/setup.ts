// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Setup Supervisor: runs a network-isolated, non-clustered instance over a
 * local socket, provisions it, and stops it before the final server starts.
 *
 * The instance lives in a Scope, so any failure on the way kills it.
 */

import type { FileSystem } from "@effect/platform";
import { type Duration, Effect } from "effect";
import type { EntrypointConfig } from "../config/env";
import type { NodeSettings } from "../config/settings";
import {
  type InvalidConfiguration,
  type ProvisioningFailed,
  ShutdownFailed,
  type StartupFailed,
  type SystemError,
} from "../lib/errors";
import { logSuccess, trackStages } from "../lib/log";
import { type Argv, appendArgs, toAbsolutePath } from "../lib/types";
import type { ProcessHandle } from "../system/exec";
import { ProcessSupervisor } from "../system/services/supervisor";
import { clientArgv } from "./client";
import { applyOverrides, runInitScripts } from "./init-scripts";
import { type DataLayout, SYSTEM_DATABASE } from "./layout";
import { createDatabase, createUser, loadTimezones } from "./provision";
import { awaitReady, probeClient } from "./readiness";
import { setupRootAccount } from "./root-account";

export interface SetupContext {
  /** Server invocation without mode arguments. */
  readonly argv: Argv;
  readonly socket: string;
  readonly layout: DataLayout;
  readonly settings: NodeSettings;
  readonly config: EntrypointConfig;
}

export type SetupError =
  | StartupFailed
  | ProvisioningFailed
  | ShutdownFailed
  | InvalidConfiguration
  | SystemError;

export const setupArgv = (argv: Argv, socket: string): Argv =>
  appendArgs(argv, "--skip-networking", `--socket=${socket}`, "--wsrep-provider=none");

const PROVISIONING_STAGES = 5;

/**
 * SIGTERM, then wait up to `timeout` for a clean exit. A child still running
 * after that is left to the Scope, which escalates to SIGKILL.
 */
export const stopInstance = (
  handle: ProcessHandle,
  options: { readonly timeout: Duration.DurationInput; readonly product: string }
): Effect.Effect<void, ShutdownFailed> =>
  Effect.gen(function* () {
    const failed = (detail: string): ShutdownFailed =>
      new ShutdownFailed({ message: `${options.product} init process failed! ${detail}` });

    const exitCode = yield* handle.terminate.pipe(
      Effect.zipRight(handle.awaitExit),
      Effect.mapError((e) => failed(e.message)),
      Effect.timeoutFail({
        duration: options.timeout,
        onTimeout: () => failed(`Process ${handle.pid} did not exit within the stop timeout`),
      })
    );
    if (exitCode !== 0) {
      return yield* Effect.fail(failed(`Process ${handle.pid} exited with code ${exitCode}`));
    }
  });

export const runSetup = (
  context: SetupContext
): Effect.Effect<void, SetupError, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const { config, settings, socket } = context;
      const supervisor = yield* ProcessSupervisor;
      const client = clientArgv(config.binaries.client, socket);

      const handle = yield* supervisor.spawn(setupArgv(context.argv, socket), {
        killAfter: config.timing.stopTimeout,
      });
      yield* Effect.logDebug(`Setup instance started with pid ${handle.pid}`);
      yield* awaitReady(handle, probeClient(client), {
        interval: config.timing.readinessInterval,
        product: config.product,
      });

      const stages = yield* trackStages(PROVISIONING_STAGES);

      yield* stages.advance("Loading time zone data");
      if (settings.loadTimezones) {
        yield* loadTimezones(
          config.binaries.tzinfo,
          config.paths.zoneinfoDir,
          clientArgv(config.binaries.client, socket, SYSTEM_DATABASE)
        );
      } else {
        yield* Effect.log("Time zone loading disabled, skipping");
      }

      yield* stages.advance("Creating application database");
      yield* createDatabase(settings, client);

      yield* stages.advance("Creating application user");
      yield* createUser(settings, client);

      const initDbDir = yield* toAbsolutePath(config.paths.initDbDir, "ENTRYPOINT_INITDB_DIR");
      yield* stages.advance(`Running init scripts from ${initDbDir}`);
      const overrides = yield* runInitScripts(initDbDir, {
        settings,
        client,
        socket,
        dataDir: context.layout.dataDir,
        shell: config.binaries.shell,
      });

      yield* stages.advance("Configuring root account");
      yield* setupRootAccount(applyOverrides(settings, overrides), client);

      yield* stopInstance(handle, { timeout: config.timing.stopTimeout, product: config.product });
      yield* logSuccess(`${config.product} setup complete`);
    })
  );
