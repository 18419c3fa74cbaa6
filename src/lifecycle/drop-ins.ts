// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Server option files shipped in the init directory are installed into the
 * server's drop-in directory before the configuration is validated.
 */

import { posix } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { SystemError, errorMessage } from "../lib/errors";
import { copyFile, directoryExists, ensureDirectory } from "../system/fs";

export const DROP_IN_SUFFIX = ".cnf";

/** Copies every `*.cnf` below `initDbDir` into `confDir`; returns the installed paths. */
export const installDropIns = (
  initDbDir: string,
  confDir: string
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* Effect.log(`Searching for custom configs in ${initDbDir}...`);
    if (!(yield* directoryExists(initDbDir))) {
      return [];
    }

    const fs = yield* FileSystem.FileSystem;
    const entries = yield* fs.readDirectory(initDbDir, { recursive: true }).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            message: `Failed to list ${initDbDir}: ${errorMessage(e)}`,
            cause: e,
          })
      )
    );
    const candidates = entries.filter((entry) => entry.endsWith(DROP_IN_SUFFIX)).sort();
    if (candidates.length === 0) {
      return [];
    }

    yield* ensureDirectory(confDir);
    return yield* Effect.forEach(candidates, (entry) =>
      Effect.gen(function* () {
        const target = posix.join(confDir, posix.basename(entry));
        yield* copyFile(posix.join(initDbDir, entry), target);
        yield* Effect.log(`Installed ${entry} -> ${target}`);
        return target;
      })
    );
  });
