// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { generateHex, generatePassword } from "../../src/lib/crypto";

describe("generatePassword", () => {
  test("defaults to 32 alphanumeric characters", () => {
    expect(generatePassword()).toMatch(/^[A-Za-z0-9]{32}$/);
  });

  test("honors the requested length", () => {
    expect(generatePassword(7)).toHaveLength(7);
  });

  test("successive passwords differ", () => {
    expect(generatePassword()).not.toBe(generatePassword());
  });
});

describe("generateHex", () => {
  test("two characters per byte", () => {
    expect(generateHex(8)).toMatch(/^[0-9a-f]{16}$/);
  });
});
