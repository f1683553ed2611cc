// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { describe, expect, test } from "vitest";
import {
  ErrorCode,
  ProvisioningError,
  StagingError,
  causeOf,
  errorMessage,
} from "../../src/lib/errors";

describe("errors", () => {
  test("provisioning and staging failures have distinct tags and codes", () => {
    const provisioning = new ProvisioningError({
      code: ErrorCode.PROVISIONING_FAILED,
      message: "Package installation failed with exit code 1: dnf install -y git",
      step: "install",
    });
    const staging = new StagingError({
      code: ErrorCode.STAGING_FAILED,
      message: "Staged executable not found in build context: build.sh (/srv/build.sh)",
      source: "/srv/build.sh",
    });

    expect(provisioning._tag).toBe("ProvisioningError");
    expect(staging._tag).toBe("StagingError");
    expect(provisioning.code).toBe(40);
    expect(staging.code).toBe(41);
  });

  test("tagged errors are Error instances with their message", () => {
    const error = new StagingError({
      code: ErrorCode.STAGING_FAILED,
      message: "copy failed",
      source: "build.sh",
    });
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("copy failed");
  });

  describe("errorMessage", () => {
    test("reads Error messages", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    test("passes strings through", () => {
      expect(errorMessage("plain")).toBe("plain");
    });

    test("stringifies anything else", () => {
      expect(errorMessage(42)).toBe("42");
    });
  });

  describe("causeOf", () => {
    test("attaches Error causes", () => {
      const cause = new Error("inner");
      expect(causeOf(cause)).toEqual({ cause });
    });

    test("drops non-Error values", () => {
      expect(causeOf("inner")).toEqual({});
    });
  });
});
