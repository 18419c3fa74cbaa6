// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over the @effect/platform FileSystem service.
 * Failures surface as SystemError naming the path involved.
 */

import { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, pipe } from "effect";
import { SystemError, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";

const fsError =
  (action: string, path: string) =>
  (e: unknown): SystemError =>
    new SystemError({ message: `Failed to ${action} ${path}: ${errorMessage(e)}`, cause: e });

export interface DirectoryEntry {
  readonly name: string;
  readonly type: string;
  readonly size: bigint;
}

/**
 * Check if a path exists. Permission errors count as absent.
 */
export const fileExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path).pipe(Effect.orElseSucceed(() => false));
  });

export const directoryExists = (
  path: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.stat(path).pipe(
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    );
  });

/** Entry names, sorted by code unit so the order is locale-independent. */
export const listDirectory = (
  path: string
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* fs.readDirectory(path).pipe(Effect.mapError(fsError("list", path)));
    return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  });

export const describeDirectory = (
  path: AbsolutePath
): Effect.Effect<readonly DirectoryEntry[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* listDirectory(path);
    return yield* Effect.forEach(names, (name) =>
      fs.stat(pathJoin(path, name)).pipe(
        Effect.map((info): DirectoryEntry => ({ name, type: info.type, size: info.size })),
        Effect.mapError(fsError("stat", pathJoin(path, name)))
      )
    );
  });

export const readText = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path).pipe(Effect.mapError(fsError("read", path)));
  });

export const readBytes = (
  path: string
): Effect.Effect<Uint8Array, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(path).pipe(Effect.mapError(fsError("read", path)));
  });

export const ensureDirectory = (
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError(fsError("create directory", path)));
  });

/**
 * Remove every non-hidden entry of `path`, then make sure the directory
 * exists. Dotfiles survive, matching a shell `rm -rf dir/*`.
 */
export const clearDirectory = (
  path: AbsolutePath
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const present = yield* directoryExists(path);
    const names = present ? yield* listDirectory(path) : [];

    yield* Effect.forEach(
      names.filter((name) => !name.startsWith(".")),
      (name) =>
        fs
          .remove(pathJoin(path, name), { recursive: true })
          .pipe(Effect.mapError(fsError("remove", pathJoin(path, name)))),
      { discard: true }
    );
    yield* ensureDirectory(path);
  });

export const copyFile = (
  from: string,
  to: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.copyFile(from, to).pipe(Effect.mapError(fsError(`copy ${from} to`, to)));
  });

/** Last `count` lines of a text file; a trailing newline does not count as a line. */
export const tailLines = (
  path: string,
  count: number
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem> =>
  Effect.map(readText(path), (content) =>
    pipe(
      content.endsWith("\n") ? content.slice(0, -1) : content,
      (text) => (text === "" ? [] : text.split("\n")),
      Arr.takeRight(count)
    )
  );

