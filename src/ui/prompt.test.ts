import { PassThrough } from "stream";
import { describe, it, expect } from "vitest";
import { promptDuration } from "./prompt";

function createStreams(answers: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.setEncoding("utf8");
  output.on("data", (chunk: string) => (written += chunk));

  input.end(answers.map((answer) => `${answer}\n`).join(""));
  return { input, output, written: () => written };
}

describe("promptDuration", () => {
  it("returns the recommended duration", async () => {
    const { input, output, written } = createStreams(["1"]);

    await expect(promptDuration(input, output)).resolves.toBe(30);
    expect(written()).toContain("Select test duration:");
  });

  it("returns null for an unlimited run", async () => {
    const { input, output } = createStreams(["0"]);
    await expect(promptDuration(input, output)).resolves.toBeNull();
  });

  it("asks again until a custom duration is valid", async () => {
    const { input, output, written } = createStreams(["5", "2", "abc", "0", "90s"]);

    await expect(promptDuration(input, output)).resolves.toBe(1.5);
    expect(written()).toContain("Please enter 0, 1, or 2.");
    expect(written()).toContain("Please enter a valid number.");
    expect(written()).toContain("Please enter a positive number.");
  });

  it("rejects when input ends before an answer", async () => {
    const { input, output } = createStreams([]);
    await expect(promptDuration(input, output)).rejects.toThrow("Input closed before a test duration was selected");
  });
});
