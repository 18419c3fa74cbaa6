// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { account, quoteIdentifier, quoteString } from "../../src/lifecycle/sql";

describe("quoteString", () => {
  test("plain values", () => {
    expect(quoteString("test-secret")).toBe("'test-secret'");
  });

  test("quotes and backslashes are escaped", () => {
    expect(quoteString("it's")).toBe("'it\\'s'");
    expect(quoteString("a\\b")).toBe("'a\\\\b'");
  });

  test("empty string", () => {
    expect(quoteString("")).toBe("''");
  });
});

describe("quoteIdentifier", () => {
  test("backticks are doubled", () => {
    expect(quoteIdentifier("app")).toBe("`app`");
    expect(quoteIdentifier("we`ird")).toBe("`we``ird`");
  });
});

describe("account", () => {
  test("user and host both quoted", () => {
    expect(account("root", "%")).toBe("'root'@'%'");
  });
});
