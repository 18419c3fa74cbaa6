// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * SQL literal quoting for provisioning statements. Values come from the
 * operator's environment, so they are escaped rather than interpolated raw.
 */

/** Single-quoted string literal; backslashes and quotes are escaped. */
export const quoteString = (value: string): string =>
  `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;

/** Backtick-quoted identifier; embedded backticks are doubled. */
export const quoteIdentifier = (name: string): string => `\`${name.replace(/`/g, "``")}\``;

/** `'user'@'host'` account name. */
export const account = (user: string, host: string): string =>
  `${quoteString(user)}@${quoteString(host)}`;
