// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Descriptor merging. Several descriptor files layer onto each other
 * before a single schema decode, so a site-wide file can carry the base
 * image and a project file only the package list.
 */

import { isPlainObject } from "../lib/assert";

/**
 * Deep merge two parsed TOML tables, with source values taking precedence.
 * Tables merge key by key; arrays and scalars from `source` replace those in `target`.
 */
export const deepMerge = (
  target: Readonly<Record<string, unknown>>,
  source: Readonly<Record<string, unknown>>
): Record<string, unknown> => {
  const overrides = Object.fromEntries(
    Object.entries(source)
      .filter(([, v]) => v !== undefined && v !== null)
      .map(([key, sourceValue]) => {
        const targetValue = target[key];
        // Recursive case: both are tables
        if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
          return [key, deepMerge(targetValue, sourceValue)];
        }
        return [key, sourceValue];
      })
  );
  return { ...target, ...overrides };
};

/** Fold descriptor tables left to right; later files win. */
export const mergeTables = (
  tables: readonly Readonly<Record<string, unknown>>[]
): Record<string, unknown> => tables.reduce<Record<string, unknown>>(deepMerge, {});
