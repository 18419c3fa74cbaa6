// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Bootstrap Classifier: decides once per container start how this node
 * enters the cluster.
 *
 * | join address | node marker | mode           |
 * |--------------|-------------|----------------|
 * | present      | present     | RecoverAndJoin |
 * | present      | absent      | JoinExisting   |
 * | absent       | absent      | BootstrapNew   |
 * | absent       | present     | StartNormally  |
 */

import { Data, Effect, Match, Option, pipe } from "effect";
import { errorMessage } from "../lib/errors";
import { isSuccess } from "../system/exec";
import { ProcessSupervisor } from "../system/services/supervisor";

export type BootstrapMode = Data.TaggedEnum<{
  JoinExisting: { readonly joinAddress: string };
  RecoverAndJoin: { readonly joinAddress: string };
  BootstrapNew: object;
  StartNormally: object;
}>;

export const BootstrapMode = Data.taggedEnum<BootstrapMode>();

export const NEW_CLUSTER_FLAG = "--wsrep-new-cluster";

export const clusterAddressArgument = (joinAddress: string): string =>
  `--wsrep-cluster-address=gcomm://${joinAddress}`;

export const classify = (joinAddress: Option.Option<string>, nodeMarker: boolean): BootstrapMode =>
  Option.match(joinAddress, {
    onSome: (address) =>
      nodeMarker
        ? BootstrapMode.RecoverAndJoin({ joinAddress: address })
        : BootstrapMode.JoinExisting({ joinAddress: address }),
    onNone: () => (nodeMarker ? BootstrapMode.StartNormally() : BootstrapMode.BootstrapNew()),
  });

/**
 * Joining nodes receive their data by state transfer, so they skip the
 * initialize check and the setup pass.
 */
export const joinsCluster = (mode: BootstrapMode): boolean =>
  pipe(
    Match.value(mode),
    Match.tagsExhaustive({
      JoinExisting: () => true,
      RecoverAndJoin: () => true,
      BootstrapNew: () => false,
      StartNormally: () => false,
    })
  );

/**
 * Ask the recovery helper for the last committed cluster position. A missing
 * or failing helper is not fatal: the server's own crash recovery takes over.
 */
export const recoverPosition = (
  tool: string
): Effect.Effect<Option.Option<string>, never, ProcessSupervisor> =>
  Effect.gen(function* () {
    const supervisor = yield* ProcessSupervisor;
    const located = yield* supervisor.locate(tool);
    if (Option.isNone(located)) {
      yield* Effect.logWarning(`${tool} not found, starting without a recovered position`);
      return Option.none();
    }

    const result = yield* supervisor.run([located.value]);
    if (!isSuccess(result)) {
      yield* Effect.logWarning(
        `${tool} exited with code ${result.exitCode}, starting without a recovered position`
      );
      return Option.none();
    }

    const position = result.stdout.trim();
    return position === "" ? Option.none() : Option.some(position);
  }).pipe(
    Effect.catchTag("SystemError", (e) =>
      Effect.as(
        Effect.logWarning(
          `${tool} could not be run (${errorMessage(e)}), starting without a recovered position`
        ),
        Option.none()
      )
    )
  );

/** Arguments the mode adds to the final server invocation. */
export const modeArguments = (
  mode: BootstrapMode,
  recoveryTool: string
): Effect.Effect<readonly string[], never, ProcessSupervisor> =>
  pipe(
    Match.value(mode),
    Match.tagsExhaustive({
      RecoverAndJoin: ({ joinAddress }) =>
        Effect.map(recoverPosition(recoveryTool), (position) => [
          clusterAddressArgument(joinAddress),
          ...Option.toArray(position),
        ]),
      JoinExisting: ({ joinAddress }) => Effect.succeed([clusterAddressArgument(joinAddress)]),
      BootstrapNew: () => Effect.succeed([NEW_CLUSTER_FLAG]),
      StartNormally: () => Effect.succeed([]),
    })
  );
