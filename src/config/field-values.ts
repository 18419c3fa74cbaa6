// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** Root password sentinels understood in MYSQL_ROOT_PASSWORD. */
export const ROOT_PASSWORD_RANDOM = "RANDOM";
export const ROOT_PASSWORD_EMPTY = "EMPTY";

/** Spellings accepted as "on" by boolean database inputs. */
export const TRUTHY_VALUES: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);

export const isTruthy = (value: string): boolean => TRUTHY_VALUES.has(value.trim().toLowerCase());
