import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import { DEFAULT_DURATION_MINUTES } from "../constants";
import { parseDuration } from "../utils/duration";

const MENU = ["", "Select test duration:", "0 - Unlimited", `1 - ${DEFAULT_DURATION_MINUTES} minutes (Recommended)`, "2 - Custom duration", ""].join("\n");

/**
 * Asks for the total test duration in minutes. `null` means unlimited.
 * Rejects if the input closes before a valid answer.
 */
export async function promptDuration(input: Readable = process.stdin, output: Writable = process.stdout): Promise<number | null> {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const ask = async (question: string): Promise<string> => {
    output.write(question);
    const next = await lines.next();
    if (next.done) throw new Error("Input closed before a test duration was selected");
    return next.value.trim();
  };

  try {
    for (;;) {
      output.write(MENU);
      const choice = await ask("Enter your choice (0-2): ");

      if (choice === "0") return null;
      if (choice === "1") return DEFAULT_DURATION_MINUTES;
      if (choice !== "2") {
        output.write("Please enter 0, 1, or 2.\n");
        continue;
      }

      for (;;) {
        const answer = await ask("Enter custom duration in minutes (or e.g. 90s, 2h): ");
        try {
          const minutes = parseDuration(answer);
          if (minutes !== null) return minutes;
          output.write("Please enter a positive number.\n");
        } catch {
          output.write("Please enter a valid number.\n");
        }
      }
    }
  } finally {
    rl.close();
  }
}
