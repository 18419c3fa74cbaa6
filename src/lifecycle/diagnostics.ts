// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Diagnostics Reporter. Collects the same evidence bundle for every fatal
 * error and writes it to stderr. It never recovers: the failing error
 * still ends the run.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { type EntrypointError, errorMessage } from "../lib/errors";
import { logFail, writeError } from "../lib/log";
import type { Argv } from "../lib/types";
import { describeDirectory, tailLines } from "../system/fs";
import { ProcessSupervisor } from "../system/services/supervisor";
import type { DataLayout } from "./layout";

export const ERROR_LOG_TAIL_LINES = 1024;

export interface DiagnosticSection {
  readonly title: string;
  readonly body: string;
}

const unavailable = (reason: string): string => `(unavailable: ${reason})`;

const commandSection = (
  title: string,
  argv: Argv
): Effect.Effect<DiagnosticSection, never, ProcessSupervisor> =>
  Effect.flatMap(ProcessSupervisor, (supervisor) => supervisor.run(argv)).pipe(
    Effect.map((result) => {
      const output = result.stdout.trimEnd();
      const body =
        result.exitCode === 0
          ? output
          : [output, `(exit code ${result.exitCode}) ${result.stderr.trim()}`.trimEnd()]
              .filter((part) => part !== "")
              .join("\n");
      return { title, body };
    }),
    Effect.catchAll((e) => Effect.succeed({ title, body: unavailable(errorMessage(e)) }))
  );

const listingSection = (
  layout: Option.Option<DataLayout>
): Effect.Effect<DiagnosticSection, never, FileSystem.FileSystem> =>
  Option.match(layout, {
    onNone: () =>
      Effect.succeed({
        title: "ls -l <datadir>",
        body: unavailable("data directory not yet known"),
      }),
    onSome: ({ dataDir }) =>
      describeDirectory(dataDir).pipe(
        Effect.map((entries) => ({
          title: `ls -l ${dataDir}`,
          body:
            entries.length === 0
              ? "(empty)"
              : entries
                  .map(
                    (entry) =>
                      `${entry.type.padEnd(12)} ${entry.size.toString().padStart(12)} ${entry.name}`
                  )
                  .join("\n"),
        })),
        Effect.catchAll((e) =>
          Effect.succeed({ title: `ls -l ${dataDir}`, body: unavailable(e.message) })
        )
      ),
  });

const errorLogSection = (
  layout: Option.Option<DataLayout>
): Effect.Effect<DiagnosticSection, never, FileSystem.FileSystem> =>
  Option.match(layout, {
    onNone: () =>
      Effect.succeed({
        title: `tail -n${ERROR_LOG_TAIL_LINES} <error log>`,
        body: unavailable("data directory not yet known"),
      }),
    onSome: ({ errorLog }) => {
      const title = `tail -n${ERROR_LOG_TAIL_LINES} ${errorLog}`;
      return tailLines(errorLog, ERROR_LOG_TAIL_LINES).pipe(
        Effect.map((lines) => ({ title, body: lines.join("\n") })),
        Effect.catchAll((e) => Effect.succeed({ title, body: unavailable(e.message) }))
      );
    },
  });

/** Evidence in a fixed order: identity, data directory, error log, journal. */
export const collectDiagnostics = (
  layout: Option.Option<DataLayout>
): Effect.Effect<readonly DiagnosticSection[], never, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.all([
    commandSection("id", ["id"]),
    listingSection(layout),
    errorLogSection(layout),
    commandSection("journalctl -xe --no-pager", ["journalctl", "-xe", "--no-pager"]),
  ]);

export const renderReport = (
  error: EntrypointError,
  sections: readonly DiagnosticSection[]
): string =>
  pipe(
    sections.map((section) => `${section.title}:\n${section.body}\n`),
    (parts) => [
      "Failure detected. Some diagnostic info below:",
      `${error._tag}: ${error.message}`,
      "",
      ...parts,
    ],
    (lines) => lines.join("\n")
  );

export const reportDiagnostics = (
  error: EntrypointError,
  layout: Option.Option<DataLayout>
): Effect.Effect<void, never, ProcessSupervisor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* logFail(`${error._tag}: ${error.message}`);
    const sections = yield* collectDiagnostics(layout);
    yield* writeError(renderReport(error, sections));
  });
