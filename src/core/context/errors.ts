// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/context/errors`
 * Purpose: Errors raised by the context composition layer.
 * Scope: Ownership violations on cancellation triggers and rejected business data. Does not cover env or exporter setup.
 * Invariants: Pure domain errors, no infrastructure concerns
 * Side-effects: none (error definitions only)
 * Notes: Missing business data and repeated guard ends are not errors; they never reach this module.
 * Links: Thrown by ScopeGuard and BusinessDataStore
 * @public
 */

import type { z } from "zod";

/**
 * Thrown when a guard that did not introduce a cancellation scope tries to
 * trigger or hand off one. Inheriting guards never hold a trigger.
 */
export class CancellationOwnershipError extends Error {
  /** Error code for programmatic handling */
  public readonly code = "CANCELLATION_NOT_OWNED" as const;

  constructor(
    /** Span name of the guard that attempted the operation */
    public readonly spanName: string,
    public readonly operation: "cancel" | "takeTrigger"
  ) {
    super(
      `Guard for span "${spanName}" holds no cancellation trigger (${operation})`
    );
    this.name = "CancellationOwnershipError";
  }
}

/**
 * Thrown when a value fails the schema attached to its data key.
 * The previously stored value, if any, is left untouched.
 */
export class BusinessDataValidationError extends Error {
  /** Error code for programmatic handling */
  public readonly code = "INVALID_BUSINESS_DATA" as const;

  constructor(
    public readonly keyName: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(
      `Invalid business data for key "${keyName}": ${issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`
    );
    this.name = "BusinessDataValidationError";
  }
}

export function isCancellationOwnershipError(
  error: unknown
): error is CancellationOwnershipError {
  return error instanceof CancellationOwnershipError;
}

export function isBusinessDataValidationError(
  error: unknown
): error is BusinessDataValidationError {
  return error instanceof BusinessDataValidationError;
}
