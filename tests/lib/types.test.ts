// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { describe, expect, test } from "vitest";
import { Effect } from "effect";
import {
  AbsolutePathSchema,
  PackageNameSchema,
  containerImage,
  decodeContainerImage,
  parseErrorToGeneralError,
  path,
} from "../../src/lib/types";

describe("literal constructors", () => {
  test("path brands an absolute literal", () => {
    expect(path("/usr/local/bin/build.sh")).toBe("/usr/local/bin/build.sh");
  });

  test("containerImage brands a valid literal", () => {
    expect(containerImage("docker.io/library/debian:12")).toBe("docker.io/library/debian:12");
  });

  test("make rejects a relative path", () => {
    expect(() => AbsolutePathSchema.make("build.sh")).toThrow();
  });

  test("make rejects a package name that reads as a flag", () => {
    expect(() => PackageNameSchema.make("--force")).toThrow();
  });
});

describe("decodeContainerImage", () => {
  test("brands a valid reference", async () => {
    const image = await Effect.runPromise(decodeContainerImage("localhost/ci:latest"));
    expect(image).toBe("localhost/ci:latest");
  });

  test("maps a bad reference to an INVALID_ARGS error", async () => {
    const error = await Effect.runPromise(
      Effect.flip(decodeContainerImage("bad ref").pipe(Effect.mapError(parseErrorToGeneralError)))
    );
    expect(error._tag).toBe("GeneralError");
    expect(error.code).toBe(2);
    expect(error.message).toContain("Invalid container image format");
  });

  test("a reference that starts with a dash is rejected", async () => {
    const error = await Effect.runPromise(
      Effect.flip(decodeContainerImage("--squash").pipe(Effect.mapError(parseErrorToGeneralError)))
    );
    expect(error.code).toBe(2);
  });
});
