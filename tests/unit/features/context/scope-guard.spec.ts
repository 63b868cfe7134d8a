// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/context/scope-guard`
 * Purpose: Unit tests for ScopeGuard - exactly-once span end and single-owner cancellation trigger.
 * Scope: end(), cancel(), endAndCancel(), takeTrigger(), runScoped() finalization. Does NOT test policy resolution.
 * Invariants: End counts are read from FakeTraceAdapter, which counts every span.end() call.
 * Side-effects: none
 * Links: src/features/context/scope-guard.ts, src/features/context/request-context.ts
 * @public
 */

import { ROOT_CONTEXT, SpanStatusCode } from "@opentelemetry/api";
import { describe, expect, it } from "vitest";

import {
  CancellationOwnershipError,
  isCancellationOwnershipError,
} from "@/core/context/public";
import { runScoped, TraceSources } from "@/features/context/public";
import { makeTestRuntime } from "@tests/_fakes";

function rootWithSpan(name: string, policy: "new" | "none" = "new") {
  const testRuntime = makeTestRuntime();
  const scoped = testRuntime.runtime.create(
    TraceSources.context(ROOT_CONTEXT),
    policy,
    { spanName: name }
  );
  return { ...testRuntime, ...scoped };
}

describe("features/context/ScopeGuard", () => {
  describe("end()", () => {
    it("ends the span once and moves to the ended state", () => {
      const { guard, trace } = rootWithSpan("job");

      expect(guard.state).toBe("active");
      guard.end();

      expect(guard.state).toBe("ended");
      expect(guard.ended).toBe(true);
      expect(trace.endCount("job")).toBe(1);
    });

    it("ignores a second end", () => {
      const { guard, trace } = rootWithSpan("job");

      guard.end();
      guard.end();

      expect(trace.endCount("job")).toBe(1);
    });

    it("does not cancel the scope it owns", () => {
      const { ctx, guard } = rootWithSpan("job");

      guard.end();

      expect(ctx.isCancelled()).toBe(false);
      expect(guard.ownsCancellation).toBe(true);
    });
  });

  describe("cancel()", () => {
    it("triggers the owned scope with the given reason", () => {
      const { ctx, guard } = rootWithSpan("job");

      guard.cancel("deadline");

      expect(ctx.isCancelled()).toBe(true);
      expect(ctx.cancellationObserver()?.reason).toBe("deadline");
    });

    it("still works after the span has ended", () => {
      const { ctx, guard } = rootWithSpan("job");

      guard.end();
      guard.cancel();

      expect(ctx.isCancelled()).toBe(true);
    });

    it("throws CancellationOwnershipError without a trigger", () => {
      const { guard } = rootWithSpan("job", "none");

      let thrown: unknown;
      try {
        guard.cancel();
      } catch (error) {
        thrown = error;
      }

      expect(isCancellationOwnershipError(thrown)).toBe(true);
      if (thrown instanceof CancellationOwnershipError) {
        expect(thrown.code).toBe("CANCELLATION_NOT_OWNED");
        expect(thrown.operation).toBe("cancel");
        expect(thrown.message).toBe(
          'Guard for span "job" holds no cancellation trigger (cancel)'
        );
      }
    });
  });

  describe("endAndCancel()", () => {
    it("ends the span and triggers the owned scope", () => {
      const { ctx, guard, trace } = rootWithSpan("job");

      guard.endAndCancel("finished");

      expect(trace.endCount("job")).toBe(1);
      expect(ctx.cancellationObserver()?.reason).toBe("finished");
    });

    it("only ends the span when no trigger is held", () => {
      const { ctx, guard, trace } = rootWithSpan("job", "none");

      expect(() => guard.endAndCancel()).not.toThrow();
      expect(trace.endCount("job")).toBe(1);
      expect(ctx.isCancelled()).toBe(false);
    });
  });

  describe("takeTrigger()", () => {
    it("moves the trigger out of the guard", () => {
      const { ctx, guard } = rootWithSpan("job");

      const trigger = guard.takeTrigger();

      expect(guard.ownsCancellation).toBe(false);
      expect(() => guard.cancel()).toThrow(CancellationOwnershipError);
      trigger.trigger("handed off");
      expect(ctx.cancellationObserver()?.reason).toBe("handed off");
    });

    it("can be taken only once", () => {
      const { guard } = rootWithSpan("job");

      guard.takeTrigger();

      expect(() => guard.takeTrigger()).toThrow(
        'Guard for span "job" holds no cancellation trigger (takeTrigger)'
      );
    });
  });

  describe("runScoped()", () => {
    it("ends the span exactly once when the body already ended it", async () => {
      const { ctx, guard, trace } = rootWithSpan("job");

      const result = await runScoped({ ctx, guard }, (_ctx, innerGuard) => {
        innerGuard.end();
        return "ok";
      });

      expect(result).toBe("ok");
      expect(trace.endCount("job")).toBe(1);
    });

    it("records the failure, ends the span and rethrows", async () => {
      const { ctx, guard, trace } = rootWithSpan("job");

      await expect(
        runScoped({ ctx, guard }, async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      const record = trace.findSpan("job");
      expect(record?.endCount).toBe(1);
      expect(record?.exceptions).toHaveLength(1);
      expect(record?.status).toEqual({
        code: SpanStatusCode.ERROR,
        message: "boom",
      });
    });

    it("ends child spans on every path through runChild()", async () => {
      const { ctx, guard, trace } = rootWithSpan("root");

      const spanId = await ctx.runChild("step", "inherit", (child) =>
        child.spanDescriptor().spanId
      );
      await expect(
        ctx.runChild("failing-step", "none", () => {
          throw new Error("step failed");
        })
      ).rejects.toThrow("step failed");
      guard.end();

      expect(spanId).toBe(trace.findSpan("step")?.spanId);
      expect(trace.endCount("step")).toBe(1);
      expect(trace.endCount("failing-step")).toBe(1);
      expect(trace.endCount("root")).toBe(1);
    });
  });
});
