// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/context/business-data-store`
 * Purpose: Single-slot-per-key container for request-scoped payload shared by a whole lineage.
 * Scope: insert/get/has plus introspection. Does not know about spans, cancellation or logging.
 * Invariants:
 *   - Exactly one store per lineage; descendants receive the same instance, never a copy
 *   - insert() replaces the previous value for the key (last write wins)
 *   - get() returns the stored reference, or undefined when the key was never written
 *   - A schema rejection leaves the slot as it was
 * Side-effects: none
 * Notes: Operations are synchronous and the event loop serializes them, so no lock is taken.
 *        Not a general map: one value per DataKey, keys compared by identity.
 * Links: data-key.ts, features/context/request-context.ts
 * @public
 */

import type { DataKey } from "./data-key";
import { BusinessDataValidationError } from "./errors";

export class BusinessDataStore {
  private readonly written = new Map<object, string>();

  insert<T>(key: DataKey<T>, value: T): void {
    const stored = parseWith(key, value);
    key.write(this, stored);
    this.written.set(key, key.name);
  }

  get<T>(key: DataKey<T>): T | undefined {
    return key.read(this);
  }

  has<T>(key: DataKey<T>): boolean {
    return key.has(this);
  }

  /** Names of keys written at least once, in first-write order. */
  keyNames(): string[] {
    return [...this.written.values()];
  }

  get size(): number {
    return this.written.size;
  }
}

function parseWith<T>(key: DataKey<T>, value: T): T {
  if (!key.schema) return value;
  const result = key.schema.safeParse(value);
  if (!result.success) {
    throw new BusinessDataValidationError(key.name, result.error.issues);
  }
  return result.data;
}
