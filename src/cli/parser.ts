// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Container command parsing. The entrypoint has no options of its own:
 * everything is forwarded to the server binary.
 */

import type { Argv } from "../lib/types";

/**
 * A leading option (or no arguments at all) means "run the default server
 * with these options"; otherwise the first argument names the binary.
 */
export const parseInvocation = (args: readonly string[], defaultServer: string): Argv => {
  const [first, ...rest] = args;
  if (first === undefined || first.startsWith("-")) {
    return [defaultServer, ...args];
  }
  return [first, ...rest];
};
