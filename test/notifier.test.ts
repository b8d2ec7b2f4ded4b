import { describe, it, expect } from "vitest";
import { Writable } from "stream";
import { StreamNotifier } from "../src/notifier.js";

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, output: () => chunks.join("") };
}

describe("StreamNotifier", () => {
  it("writes info as a prefixed line", () => {
    const { stream, output } = capture();
    new StreamNotifier(stream).info("Generating commit message...");
    expect(output()).toBe("[commitline] Generating commit message...\n");
  });

  it("writes one line per notification", () => {
    const { stream, output } = capture();
    const notifier = new StreamNotifier(stream);

    notifier.warn("No staged changes found.");
    notifier.error("Empty response from model.");

    const lines = output().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain("[commitline] No staged changes found.");
    expect(lines[1]).toContain("[commitline] Empty response from model.");
    expect(lines[2]).toBe("");
  });
});
