// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A `PackageName` and a `ContainerImage` are both strings, but the compiler
 * rejects passing an image reference where a package is expected.
 */

import { type Brand, type Effect, type ParseResult, Schema, type SchemaAST } from "effect";

import { ErrorCode, GeneralError } from "./errors";
import { isValidContainerImage, isValidPackageName, parseErrorToMessage } from "./schema-utils";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type ContainerImage = string & Brand.Brand<"ContainerImage">;
export type PackageName = string & Brand.Brand<"PackageName">;
/** Name of a buildah working container. */
export type WorkingContainer = string & Brand.Brand<"WorkingContainer">;
export type ImageId = string & Brand.Brand<"ImageId">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const containerImageMsg = (): string => "Invalid container image format";
const packageNameMsg = (): string =>
  "Package name must match [A-Za-z0-9][A-Za-z0-9+._:-]* (no leading dash)";

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const ContainerImageSchema: Schema.BrandSchema<ContainerImage, string, never> =
  Schema.String.pipe(
    Schema.filter(isValidContainerImage, { message: containerImageMsg }),
    Schema.brand("ContainerImage")
  );

export const PackageNameSchema: Schema.BrandSchema<PackageName, string, never> =
  Schema.String.pipe(
    Schema.filter(isValidPackageName, { message: packageNameMsg }),
    Schema.brand("PackageName")
  );

export const decodeContainerImage: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<ContainerImage, ParseResult.ParseError, never> =
  Schema.decode(ContainerImageSchema);

/** Bridge Schema `ParseError` into the application error hierarchy. */
export const parseErrorToGeneralError = (error: ParseResult.ParseError): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: parseErrorToMessage(error),
  });

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * Only accepts literals starting with `/`; paths built at run time go
 * through `lib/paths.ts`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  AbsolutePathSchema.make(literal);

/** Branded literal constructor. For dynamic input, use `decodeContainerImage`. */
export const containerImage = <const S extends string>(literal: S): ContainerImage =>
  ContainerImageSchema.make(literal);

const WorkingContainerSchema: Schema.BrandSchema<WorkingContainer, string, never> =
  Schema.String.pipe(Schema.brand("WorkingContainer"));
const ImageIdSchema: Schema.BrandSchema<ImageId, string, never> = Schema.String.pipe(
  Schema.brand("ImageId")
);

/** Builder output is trusted verbatim; buildah names containers itself. */
export const workingContainer = (name: string): WorkingContainer =>
  WorkingContainerSchema.make(name);

export const imageId = (id: string): ImageId => ImageIdSchema.make(id);
