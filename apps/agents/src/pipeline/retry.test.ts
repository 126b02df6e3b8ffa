import { describe, expect, it, vi } from "vitest";
import {
  EmptyArtifactError,
  ExternalServiceFailureError,
  ResponseUnparsableError,
  StoreFailureError,
} from "./errors";
import { callService, callStore, withBoundedRetry, type AttemptContext } from "./retry";

describe("withBoundedRetry", () => {
  it("returns the first successful value", async () => {
    const sleep = vi.fn(async () => undefined);
    const result = await withBoundedRetry(async () => "ok", { backoffMs: 100, sleep });
    expect(result).toEqual({ ok: true, value: "ok", attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("switches to strict mode after an unparsable response without backing off", async () => {
    const seen: AttemptContext[] = [];
    const sleep = vi.fn(async () => undefined);
    const result = await withBoundedRetry(
      async (context) => {
        seen.push(context);
        if (context.attempt === 1) {
          throw new ResponseUnparsableError("bad json");
        }
        return "parsed";
      },
      { backoffMs: 100, sleep }
    );
    expect(result).toEqual({ ok: true, value: "parsed", attempts: 2 });
    expect(seen).toEqual([
      { attempt: 1, strict: false },
      { attempt: 2, strict: true },
    ]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("backs off exponentially on service failures and gives up after three attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(async () => {
      throw new ExternalServiceFailureError("503");
    });
    const result = await withBoundedRetry(operation, { backoffMs: 100, sleep });
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("retries empty artifacts", async () => {
    let calls = 0;
    const result = await withBoundedRetry(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new EmptyArtifactError("no bytes");
        }
        return calls;
      },
      { backoffMs: 0, sleep: async () => undefined }
    );
    expect(result).toEqual({ ok: true, value: 3, attempts: 3 });
  });

  it("never exceeds three attempts even when asked to", async () => {
    const operation = vi.fn(async () => {
      throw new EmptyArtifactError("no bytes");
    });
    const result = await withBoundedRetry(operation, { maxAttempts: 10, backoffMs: 0, sleep: async () => undefined });
    expect(result.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("propagates errors that are not retryable", async () => {
    const operation = vi.fn(async () => {
      throw new TypeError("bug");
    });
    await expect(withBoundedRetry(operation, { backoffMs: 0 })).rejects.toThrow("bug");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    const operation = vi.fn(async () => "never");
    await expect(withBoundedRetry(operation, { backoffMs: 0, signal: controller.signal })).rejects.toThrow(
      "cancelled"
    );
    expect(operation).not.toHaveBeenCalled();
  });
});

describe("callService", () => {
  it("wraps unknown errors as external service failures", async () => {
    const error = await callService("Image synthesis", async () => {
      throw new Error("socket hang up");
    }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalServiceFailureError);
    expect(error).toHaveProperty("message", "Image synthesis failed: socket hang up");
  });

  it("passes empty-artifact errors through", async () => {
    const original = new EmptyArtifactError("nothing");
    await expect(
      callService("Image synthesis", async () => {
        throw original;
      })
    ).rejects.toBe(original);
  });
});

describe("callStore", () => {
  it("wraps failures as store failures", async () => {
    await expect(
      callStore("Saving x.png", async () => {
        throw new Error("EACCES");
      })
    ).rejects.toBeInstanceOf(StoreFailureError);
  });
});
