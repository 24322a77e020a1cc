/**
 * Deadline helper
 */

import { withTimeout } from "../src/core/agent/withTimeout";
import { TimeoutError } from "../src/core/errors";

describe("withTimeout", () => {
  test("should resolve with the operation's value inside the deadline", async () => {
    await expect(withTimeout(async () => 42, 1000)).resolves.toBe(42);
  });

  test("should pass through the operation's own rejection", async () => {
    await expect(
      withTimeout(async () => {
        throw new Error("model down");
      }, 1000)
    ).rejects.toThrow("model down");
  });

  test("should abort the signal and reject with TimeoutError when the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    const op = (signal: AbortSignal): Promise<string> => {
      seen = signal;
      return new Promise(() => undefined);
    };

    const error = await withTimeout(op, 10, "Model call").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.message).toBe("Model call exceeded 10ms");
    expect(seen?.aborted).toBe(true);
  });
});
