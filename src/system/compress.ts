// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Gzip decompression for `*.sql.gz` init scripts.
 */

import { promisify } from "node:util";
import { gunzip as gunzipCallback } from "node:zlib";
import { Effect } from "effect";
import { SystemError, errorMessage } from "../lib/errors";

const gunzipAsync = promisify(gunzipCallback);

export const gunzip = (data: Uint8Array): Effect.Effect<Uint8Array, SystemError> =>
  Effect.tryPromise({
    try: () => gunzipAsync(data),
    catch: (e) =>
      new SystemError({ message: `Failed to decompress gzip data: ${errorMessage(e)}`, cause: e }),
  });
