import { withDeadline } from "../../../src/shared/deadline.js";
import { TimeoutError } from "../../../src/shared/errors.js";

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("killed")), { once: true });
  });
}

describe("withDeadline", () => {
  it("returns the result of work that finishes in time", async () => {
    await expect(withDeadline("fast", 1_000, async () => 42)).resolves.toBe(42);
  });

  it("passes through the work's own error", async () => {
    await expect(withDeadline("broken", 1_000, () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
  });

  it("aborts the work and rejects with a TimeoutError once the deadline passes", async () => {
    const pending = withDeadline("apt-get install", 20, untilAborted);

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("apt-get install timed out after 20ms");
  });

  it("keeps how the interrupted work ended in the error context", async () => {
    const err = await withDeadline("apt-get install", 20, untilAborted).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof TimeoutError && err.context).toEqual({ operation: "apt-get install", timeoutMs: 20, cause: "killed" });
  });

  it("waits for work that ignores the abort before rejecting", async () => {
    const events: string[] = [];
    const pending = withDeadline("slow", 20, async (signal) => {
      signal.addEventListener("abort", () => events.push("aborted"));
      await new Promise((resolve) => setTimeout(resolve, 100));
      events.push("work settled");
      return "late";
    }).catch((err: unknown) => {
      events.push("caller resumed");
      throw err;
    });

    await expect(pending).rejects.toThrow("slow timed out after 20ms");
    expect(events).toEqual(["aborted", "work settled", "caller resumed"]);
  });

  it("leaves the signal alone when the work finishes in time", async () => {
    let seen: AbortSignal | undefined;
    await withDeadline("fast", 1_000, async (signal) => {
      seen = signal;
    });

    expect(seen?.aborted).toBe(false);
  });
});
