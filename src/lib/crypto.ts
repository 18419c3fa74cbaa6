// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Cryptographic utilities for random secret generation.
 */

import { randomBytes, randomFillSync } from "node:crypto";
import { Array as Arr, Option, pipe } from "effect";

/**
 * Character set for password generation.
 * Alphanumeric only - safe inside SQL string literals, shell and env vars.
 */
const PASSWORD_CHARSET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/**
 * Generate a cryptographically secure random password.
 * Uses rejection sampling to avoid modulo bias.
 */
export const generatePassword = (length = 32): string => {
  const charsetLength = PASSWORD_CHARSET.length;
  const maxValid = 256 - (256 % charsetLength);

  const charsFromBytes = (bytes: Uint8Array): string =>
    pipe(
      Array.from(bytes),
      Arr.filterMap((byte) =>
        byte < maxValid ? Option.some(PASSWORD_CHARSET.charAt(byte % charsetLength)) : Option.none()
      )
    ).join("");

  const go = (needed: number, acc: string): string => {
    if (needed <= 0) {
      return acc;
    }
    const bytes = new Uint8Array(needed * 2);
    randomFillSync(bytes);
    const taken = charsFromBytes(bytes).slice(0, needed);
    return go(needed - taken.length, acc + taken);
  };

  return go(length, "");
};

/**
 * Generate a random hex string (2 characters per byte).
 */
export const generateHex = (bytes = 16): string => randomBytes(bytes).toString("hex");
