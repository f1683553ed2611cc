// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { describe, expect, test } from "vitest";
import { Option } from "effect";
import { isDigit } from "../../src/lib/char";
import {
  all,
  chars,
  escapeWith,
  mapCharsToString,
  uncons,
} from "../../src/lib/str";

describe("str", () => {
  describe("chars", () => {
    test("splits on code points, not UTF-16 units", () => {
      expect(chars("a🌍b")).toEqual(["a", "🌍", "b"]);
    });

    test("empty string has no characters", () => {
      expect(chars("")).toEqual([]);
    });
  });

  describe("uncons", () => {
    test("splits head from tail", () => {
      expect(uncons("git")).toEqual(Option.some(["g", "it"]));
    });

    test("single character leaves an empty tail", () => {
      expect(uncons("x")).toEqual(Option.some(["x", ""]));
    });

    test("returns None for empty string", () => {
      expect(Option.isNone(uncons(""))).toBe(true);
    });
  });

  describe("all", () => {
    test("true when every character matches", () => {
      expect(all(isDigit)("2026")).toBe(true);
    });

    test("false when any character fails", () => {
      expect(all(isDigit)("20x6")).toBe(false);
    });

    test("vacuously true for empty string", () => {
      expect(all(isDigit)("")).toBe(true);
    });
  });

  describe("mapCharsToString", () => {
    test("maps each character", () => {
      expect(mapCharsToString((c) => c.toUpperCase())("dnf")).toBe("DNF");
    });
  });

  describe("escapeWith", () => {
    const escape = escapeWith(
      new Map([
        ["'", "\\'"],
        ["\n", "\\n"],
      ])
    );

    test("replaces mapped characters", () => {
      expect(escape("it's\nok")).toBe("it\\'s\\nok");
    });

    test("passes unmapped characters through", () => {
      expect(escape("plain")).toBe("plain");
    });
  });
});
