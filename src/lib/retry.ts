// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Wait schedules. Nothing in the entrypoint retries after a failure; the
 * readiness wait is the only repetition, and it is a wait-for-condition.
 */

import { type Duration, Schedule } from "effect";

/**
 * Readiness polling: fixed interval, no attempt ceiling. The caller stops
 * the repetition when the probe succeeds or the process dies.
 * Sleeps go through the runtime Clock, so TestClock drives it in tests.
 */
export const readinessSchedule = (
  interval: Duration.DurationInput
): Schedule.Schedule<number, unknown, never> => Schedule.spaced(interval);
