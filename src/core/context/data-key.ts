// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/context/data-key`
 * Purpose: Runtime discriminant that stands in for a stored type in the business data store.
 * Scope: Define DataKey and defineDataKey(). Does not hold a store or any lineage state.
 * Invariants:
 *   - Key identity is object identity; two keys with the same name never alias
 *   - A key holds at most one value per store (single slot, not a map)
 *   - Values are held weakly per store; a dropped lineage releases its values
 * Side-effects: none
 * Notes: Optional zod schema is applied on write only.
 * Links: business-data-store.ts
 * @public
 */

import type { z } from "zod";

/** Store identity a key writes against. Structural to keep the key free of store internals. */
export type DataStoreToken = object;

/**
 * Typed slot selector for business data.
 *
 * Declare keys once at module scope and share them between writer and reader:
 * ```ts
 * export const USER_ID = defineDataKey<number>("userId");
 * ```
 */
export class DataKey<T> {
  private readonly slots = new WeakMap<DataStoreToken, T>();

  constructor(
    /** Label for logs and introspection; not part of identity */
    public readonly name: string,
    public readonly schema?: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  read(store: DataStoreToken): T | undefined {
    return this.slots.get(store);
  }

  has(store: DataStoreToken): boolean {
    return this.slots.has(store);
  }

  write(store: DataStoreToken, value: T): void {
    this.slots.set(store, value);
  }

  toString(): string {
    return `DataKey(${this.name})`;
  }
}

export function defineDataKey<T>(
  name: string,
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>
): DataKey<T> {
  return new DataKey<T>(name, schema);
}
