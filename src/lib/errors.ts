// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error taxonomy for the entrypoint. Every failure travels in the typed
 * error channel as a tagged error; none of them is retried, and all of them
 * end the process with exit code 1 after a diagnostic dump.
 */

import { Data, Predicate } from "effect";

/** A value and its `_FILE` indirection were both set. */
export class ConfigurationConflict extends Data.TaggedError("ConfigurationConflict")<{
  readonly message: string;
  readonly names: readonly [string, string];
}> {}

/** The server rejected its configuration, or a required input is missing. */
export class InvalidConfiguration extends Data.TaggedError("InvalidConfiguration")<{
  readonly message: string;
  readonly command?: string;
  readonly output?: string;
}> {}

/** Creating the on-disk data store failed. The data directory is left as is for inspection. */
export class InitializationFailed extends Data.TaggedError("InitializationFailed")<{
  readonly message: string;
  readonly exitCode?: number;
}> {}

/** The setup instance exited before answering the readiness probe. */
export class StartupFailed extends Data.TaggedError("StartupFailed")<{
  readonly message: string;
}> {}

/** A provisioning statement, tool or init script failed against the setup instance. */
export class ProvisioningFailed extends Data.TaggedError("ProvisioningFailed")<{
  readonly message: string;
  readonly step: string;
}> {}

/** The setup instance did not stop cleanly on SIGTERM. */
export class ShutdownFailed extends Data.TaggedError("ShutdownFailed")<{
  readonly message: string;
}> {}

/** The final server could not be launched. */
export class HandoffFailed extends Data.TaggedError("HandoffFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A command or filesystem operation could not be performed at all. */
export class SystemError extends Data.TaggedError("SystemError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type EntrypointError =
  | ConfigurationConflict
  | InvalidConfiguration
  | InitializationFailed
  | StartupFailed
  | ProvisioningFailed
  | ShutdownFailed
  | HandoffFailed
  | SystemError;

/** Every orchestrator failure maps to the same exit code. */
export const FAILURE_EXIT_CODE = 1;

/** Platform errors are plain tagged structs, so any string `message` counts. */
export const errorMessage = (e: unknown): string => {
  if (Predicate.hasProperty(e, "message") && Predicate.isString(e.message)) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
