import { describe, it, expect, vi } from "vitest";
import { createNoopMeter, trace } from "@opentelemetry/api";
import { ShutdownError } from "../src/errors.js";
import { LifecycleGuard } from "../src/lifecycle.js";
import { ProviderHandle } from "../src/provider-handle.js";
import type { Logger } from "../src/types.js";

const resource = { serviceName: "orders-api" };

function fakeMetrics(shutdown: () => Promise<void> = () => Promise.resolve()) {
  const provider = {
    getMeter: () => createNoopMeter(),
    forceFlush: vi.fn(() => Promise.resolve()),
    shutdown: vi.fn(shutdown),
  };
  return { provider, handle: new ProviderHandle("metrics", provider, resource) };
}

function fakeTracing(shutdown: () => Promise<void> = () => Promise.resolve()) {
  const provider = {
    getTracer: (name: string) => trace.getTracer(name),
    forceFlush: vi.fn(() => Promise.resolve()),
    shutdown: vi.fn(shutdown),
  };
  return { provider, handle: new ProviderHandle("tracing", provider, resource) };
}

function fakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe("LifecycleGuard", () => {
  it("lists handles metrics first", () => {
    const metrics = fakeMetrics();
    const tracing = fakeTracing();
    const guard = new LifecycleGuard(
      { tracing: tracing.handle, metrics: metrics.handle },
      { exitHooks: false },
    );

    expect(guard.handles.map((h) => h.kind)).toEqual(["metrics", "tracing"]);
  });

  it("resolves to no errors when it owns nothing", async () => {
    const logger = fakeLogger();
    const guard = new LifecycleGuard({}, { logger });

    await expect(guard.shutdown()).resolves.toEqual([]);
    expect(guard.isShutdown).toBe(true);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("shuts every provider down and logs once", async () => {
    const logger = fakeLogger();
    const metrics = fakeMetrics();
    const tracing = fakeTracing();
    const guard = new LifecycleGuard(
      { metrics: metrics.handle, tracing: tracing.handle },
      { logger, exitHooks: false },
    );

    await expect(guard.shutdown()).resolves.toEqual([]);

    expect(metrics.provider.shutdown).toHaveBeenCalledTimes(1);
    expect(tracing.provider.shutdown).toHaveBeenCalledTimes(1);
    expect(metrics.handle.isShutdown).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("Shutting down telemetry providers", {
      providers: "metrics,tracing",
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("is idempotent", async () => {
    const metrics = fakeMetrics();
    const guard = new LifecycleGuard({ metrics: metrics.handle }, { exitHooks: false });

    const first = guard.shutdown();
    const second = guard.shutdown();
    await first;
    await guard.shutdown();

    expect(second).toBe(first);
    expect(metrics.provider.shutdown).toHaveBeenCalledTimes(1);
  });

  describe("failures", () => {
    it("reports a failing provider without blocking the other", async () => {
      const logger = fakeLogger();
      const metrics = fakeMetrics(() => Promise.reject(new Error("export failed")));
      const tracing = fakeTracing();
      const guard = new LifecycleGuard(
        { metrics: metrics.handle, tracing: tracing.handle },
        { logger, exitHooks: false },
      );

      const errors = await guard.shutdown();

      expect(tracing.provider.shutdown).toHaveBeenCalledTimes(1);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ShutdownError);
      expect(errors[0].kind).toBe("metrics");
      expect(errors[0].message).toBe("Provider shutdown failed (metrics): export failed");
      expect(errors[0].cause).toBeInstanceOf(Error);
      expect(logger.warn).toHaveBeenCalledWith("Failed to shutdown metrics provider", {
        error: "Provider shutdown failed (metrics): export failed",
      });
    });

    it("reports both providers when both fail", async () => {
      const metrics = fakeMetrics(() => Promise.reject(new Error("a")));
      const tracing = fakeTracing(() => Promise.reject(new Error("b")));
      const guard = new LifecycleGuard(
        { metrics: metrics.handle, tracing: tracing.handle },
        { exitHooks: false },
      );

      const errors = await guard.shutdown();

      expect(errors.map((e) => e.kind)).toEqual(["metrics", "tracing"]);
    });

    it("turns a synchronous throw into a shutdown error", async () => {
      const tracing = fakeTracing(() => {
        throw new Error("not initialised");
      });
      const guard = new LifecycleGuard({ tracing: tracing.handle }, { exitHooks: false });

      const errors = await guard.shutdown();

      expect(errors[0].message).toBe("Provider shutdown failed (tracing): not initialised");
    });

    it("gives up on a provider that never finishes", async () => {
      const tracing = fakeTracing(() => new Promise<void>(() => {}));
      const guard = new LifecycleGuard(
        { tracing: tracing.handle },
        { shutdownTimeoutMs: 20, exitHooks: false },
      );

      const errors = await guard.shutdown();

      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe("Provider shutdown failed (tracing): timed out after 20ms");
    });
  });

  describe("forceFlush", () => {
    it("flushes every provider", async () => {
      const metrics = fakeMetrics();
      const tracing = fakeTracing();
      const guard = new LifecycleGuard(
        { metrics: metrics.handle, tracing: tracing.handle },
        { exitHooks: false },
      );

      await guard.forceFlush();

      expect(metrics.provider.forceFlush).toHaveBeenCalledTimes(1);
      expect(tracing.provider.forceFlush).toHaveBeenCalledTimes(1);
    });

    it("logs a failed flush", async () => {
      const logger = fakeLogger();
      const tracing = fakeTracing();
      tracing.provider.forceFlush.mockRejectedValueOnce(new Error("collector down"));
      const guard = new LifecycleGuard({ tracing: tracing.handle }, { logger, exitHooks: false });

      await guard.forceFlush();

      expect(logger.warn).toHaveBeenCalledWith("Failed to flush tracing provider", {
        error: "collector down",
      });
    });

    it("does not touch providers after shutdown", async () => {
      const metrics = fakeMetrics();
      const guard = new LifecycleGuard({ metrics: metrics.handle }, { exitHooks: false });

      await guard.shutdown();
      await guard.forceFlush();

      expect(metrics.provider.forceFlush).not.toHaveBeenCalled();
    });
  });

  describe("exit hooks", () => {
    it("registers a beforeExit listener that shuts down", async () => {
      const before = process.listeners("beforeExit");
      const metrics = fakeMetrics();
      const guard = new LifecycleGuard({ metrics: metrics.handle });

      const added = process.listeners("beforeExit").filter((l) => !before.includes(l));
      expect(added).toHaveLength(1);

      added[0](0);
      await guard.shutdown();

      expect(metrics.provider.shutdown).toHaveBeenCalledTimes(1);
      expect(process.listeners("beforeExit")).toEqual(before);
    });

    it("removes the listener on explicit shutdown", async () => {
      const count = process.listenerCount("beforeExit");
      const guard = new LifecycleGuard({ metrics: fakeMetrics().handle });
      expect(process.listenerCount("beforeExit")).toBe(count + 1);

      await guard.shutdown();

      expect(process.listenerCount("beforeExit")).toBe(count);
    });

    it("registers nothing when disabled or empty", () => {
      const count = process.listenerCount("beforeExit");
      new LifecycleGuard({ metrics: fakeMetrics().handle }, { exitHooks: false });
      new LifecycleGuard({});
      expect(process.listenerCount("beforeExit")).toBe(count);
    });
  });

  it("shuts down on async dispose", async () => {
    const metrics = fakeMetrics();
    const guard = new LifecycleGuard({ metrics: metrics.handle }, { exitHooks: false });

    await guard[Symbol.asyncDispose]();

    expect(guard.isShutdown).toBe(true);
    expect(metrics.provider.shutdown).toHaveBeenCalledTimes(1);
  });
});
