import { EmptyMessageError, ParseError } from "../errors.js";
import type { CompletionResponse } from "./completion-client.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pulls `choices[0].message.content` out of a successful completion body. */
export function extractMessage(response: CompletionResponse): string {
  let data: unknown;
  try {
    data = JSON.parse(response.body);
  } catch (err) {
    throw new ParseError({ cause: err });
  }

  const choices = isRecord(data) ? data.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  if (typeof content !== "string" || content === "") {
    throw new EmptyMessageError();
  }

  return content;
}
