// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * On-disk contract of a data directory: where the markers and the error log
 * live. Only the Initializer ever writes into it; everything here reads.
 */

import type { FileSystem } from "@effect/platform";
import type { Effect } from "effect";
import { directoryExists, fileExists } from "../system/fs";
import { type AbsolutePath, pathJoin } from "../lib/types";

export interface DataLayout {
  readonly dataDir: AbsolutePath;
  /** System database directory; its presence marks a completed initialization. */
  readonly systemDbDir: AbsolutePath;
  /** Cluster state file; its presence marks prior cluster membership. */
  readonly clusterStateFile: AbsolutePath;
  readonly errorLog: AbsolutePath;
}

export const SYSTEM_DATABASE = "mysql";

export const dataLayout = (dataDir: AbsolutePath): DataLayout => ({
  dataDir,
  systemDbDir: pathJoin(dataDir, SYSTEM_DATABASE),
  clusterStateFile: pathJoin(dataDir, "grastate.dat"),
  errorLog: pathJoin(dataDir, "mysqld.err"),
});

export const hasNodeMarker = (
  layout: DataLayout
): Effect.Effect<boolean, never, FileSystem.FileSystem> => fileExists(layout.clusterStateFile);

export const hasDataStore = (
  layout: DataLayout
): Effect.Effect<boolean, never, FileSystem.FileSystem> => directoryExists(layout.systemDbDir);
