// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for imagesmith.
 * Every failure is a tagged error carrying a code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (1-9)
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;

  // Image (40-49)
  readonly PROVISIONING_FAILED: 40;
  readonly STAGING_FAILED: 41;
  readonly VERIFICATION_FAILED: 42;
}

/**
 * Error codes for all imagesmith operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  PROVISIONING_FAILED: 40,
  STAGING_FAILED: 41,
  VERIFICATION_FAILED: 42,
};

type GeneralCode = ErrorCodeMap["GENERAL_ERROR"] | ErrorCodeMap["INVALID_ARGS"];
type ConfigCode =
  | ErrorCodeMap["CONFIG_NOT_FOUND"]
  | ErrorCodeMap["CONFIG_PARSE_ERROR"]
  | ErrorCodeMap["CONFIG_VALIDATION_ERROR"];
type SystemCode =
  | ErrorCodeMap["EXEC_FAILED"]
  | ErrorCodeMap["FILE_READ_FAILED"]
  | ErrorCodeMap["FILE_WRITE_FAILED"];

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** A package-manager or builder step failed; no image is produced. */
export class ProvisioningError extends Data.TaggedError("ProvisioningError")<{
  readonly code: ErrorCodeMap["PROVISIONING_FAILED"];
  readonly message: string;
  readonly step: string;
  readonly stderr?: string;
  readonly cause?: Error;
}> {}

/** The staged executable could not be found or placed; no image is produced. */
export class StagingError extends Data.TaggedError("StagingError")<{
  readonly code: ErrorCodeMap["STAGING_FAILED"];
  readonly message: string;
  readonly source: string;
  readonly cause?: Error;
}> {}

export class VerificationError extends Data.TaggedError("VerificationError")<{
  readonly code: ErrorCodeMap["VERIFICATION_FAILED"];
  readonly message: string;
  readonly failures: readonly string[];
}> {}

export type ImagesmithError =
  | GeneralError
  | ConfigError
  | SystemError
  | ProvisioningError
  | StagingError
  | VerificationError;

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spread helper: attaches `cause` only when the caught value is an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
