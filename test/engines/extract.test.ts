import { describe, it, expect } from "vitest";
import { extractMessage } from "../../src/engines/extract.js";
import { EmptyMessageError, ParseError } from "../../src/errors.js";

const ok = (body: string) => ({ status: 200, body });

describe("extractMessage", () => {
  it("returns the first choice's content", () => {
    const body = JSON.stringify({
      id: "chatcmpl-test",
      choices: [
        { message: { role: "assistant", content: "feat: add login flow" } },
        { message: { role: "assistant", content: "fix: ignored" } },
      ],
    });
    expect(extractMessage(ok(body))).toBe("feat: add login flow");
  });

  it("returns multi-line content verbatim", () => {
    const body = JSON.stringify({ choices: [{ message: { content: "feat: a\nfix: b" } }] });
    expect(extractMessage(ok(body))).toBe("feat: a\nfix: b");
  });

  it("fails with ParseError on a body that is not JSON", () => {
    expect(() => extractMessage(ok("<html>gateway</html>"))).toThrow(ParseError);
  });

  const payloads: Array<[string, unknown]> = [
    ["empty content", { choices: [{ message: { content: "" } }] }],
    ["null content", { choices: [{ message: { content: null } }] }],
    ["no message", { choices: [{}] }],
    ["no choices", { choices: [] }],
    ["no choices key", { error: "nope" }],
    ["a bare string", "feat: x"],
  ];

  it.each(payloads)("fails with EmptyMessageError on %s", (_label, payload) => {
    expect(() => extractMessage(ok(JSON.stringify(payload)))).toThrow(EmptyMessageError);
  });
});
