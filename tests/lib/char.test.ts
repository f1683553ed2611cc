// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { describe, expect, test } from "vitest";
import {
  isAlpha,
  isAlphaNum,
  isDigit,
  isLower,
  isLowerHex,
  isOneOf,
} from "../../src/lib/char";

describe("char predicates", () => {
  describe("isLower", () => {
    test("returns true for lowercase letters", () => {
      expect(isLower("a")).toBe(true);
      expect(isLower("z")).toBe(true);
    });

    test("returns false for uppercase letters and digits", () => {
      expect(isLower("A")).toBe(false);
      expect(isLower("0")).toBe(false);
    });
  });

  describe("isDigit", () => {
    test("returns true for digits", () => {
      expect(isDigit("0")).toBe(true);
      expect(isDigit("9")).toBe(true);
    });

    test("returns false for letters", () => {
      expect(isDigit("a")).toBe(false);
    });
  });

  describe("isAlpha", () => {
    test("accepts both cases", () => {
      expect(isAlpha("a")).toBe(true);
      expect(isAlpha("Z")).toBe(true);
    });

    test("rejects digits and punctuation", () => {
      expect(isAlpha("5")).toBe(false);
      expect(isAlpha("-")).toBe(false);
    });
  });

  describe("isAlphaNum", () => {
    test("accepts letters and digits", () => {
      expect(isAlphaNum("q")).toBe(true);
      expect(isAlphaNum("Q")).toBe(true);
      expect(isAlphaNum("7")).toBe(true);
    });

    test("rejects the characters package names may add", () => {
      expect(isAlphaNum("+")).toBe(false);
      expect(isAlphaNum(".")).toBe(false);
      expect(isAlphaNum("_")).toBe(false);
    });
  });

  describe("isLowerHex", () => {
    test("accepts 0-9 and a-f", () => {
      expect(isLowerHex("0")).toBe(true);
      expect(isLowerHex("f")).toBe(true);
    });

    test("rejects uppercase hex and letters past f", () => {
      expect(isLowerHex("F")).toBe(false);
      expect(isLowerHex("g")).toBe(false);
    });
  });

  describe("isOneOf", () => {
    const isSeparator = isOneOf("_./-");

    test("matches listed characters", () => {
      expect(isSeparator("/")).toBe(true);
      expect(isSeparator("_")).toBe(true);
    });

    test("rejects everything else", () => {
      expect(isSeparator(":")).toBe(false);
      expect(isSeparator("a")).toBe(false);
    });
  });
});
