// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Console progress for the start sequence. Call sites attach a marker as log
 * annotations; effect-logger.ts decides how a marker renders.
 */

import { Data, Effect, Match, Ref, pipe } from "effect";

type Marker = Data.TaggedEnum<{
  Stage: { readonly index: number; readonly count: number };
  Done: object;
  Fatal: object;
}>;

const Marker = Data.taggedEnum<Marker>();

const markerAnnotations = (marker: Marker): Record<string, string> =>
  pipe(
    Match.value(marker),
    Match.tagsExhaustive({
      Stage: ({ index, count }) => ({
        logStyle: "step",
        stepNumber: String(index),
        stepTotal: String(count),
      }),
      Done: () => ({ logStyle: "success" }),
      Fatal: () => ({ logStyle: "fail" }),
    })
  );

const logMarked = (marker: Marker, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(markerAnnotations(marker)));

export const logStep = (index: number, count: number, message: string): Effect.Effect<void> =>
  logMarked(Marker.Stage({ index, count }), message);

export const logSuccess = (message: string): Effect.Effect<void> =>
  logMarked(Marker.Done(), message);

export const logFail = (message: string): Effect.Effect<void> =>
  logMarked(Marker.Fatal(), message);

/** Raw stdout, outside the logger: the generated root password. */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Raw stderr for the diagnostic dump, which no log level may filter. */
export const writeError = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${text}\n`);
  });

/** Numbered progress through the provisioning stages of the setup instance. */
export interface StageProgress {
  readonly advance: (stage: string) => Effect.Effect<void>;
}

export const trackStages = (count: number): Effect.Effect<StageProgress> =>
  Effect.map(Ref.make(0), (completed) => ({
    advance: (stage) =>
      Ref.updateAndGet(completed, (n) => n + 1).pipe(
        Effect.flatMap((index) => logStep(index, count, stage))
      ),
  }));
