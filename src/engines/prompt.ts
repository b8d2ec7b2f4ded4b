import type { Config } from "../config.js";

export const SYSTEM_PROMPT = `Generate a SINGLE-LINE commit message in Conventional Commits format.

Rules:
- Format: "<type>: <summary>"
- type must be lowercase and one of: feat, fix, refactor, chore, docs, test, build, ci, perf, style
- summary is a clear, imperative description of what the commit does
- single line only; no body or extra lines
- do not end with a period
- if multiple small changes, separate them with semicolons in the same line
- keep under ~72 characters when possible
- do not include scope, emojis, issue refs, or code blocks

Input is the staged diff. Output ONLY the commit line.
`;

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: [ChatMessage, ChatMessage];
  max_completion_tokens?: number;
}

export function buildRequest(
  config: Pick<Config, "model" | "maxCompletionTokens">,
  diff: string
): CompletionRequest {
  const request: CompletionRequest = {
    model: config.model,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: diff },
    ],
  };

  // Left off entirely when unset; the endpoint rejects explicit nulls
  if (config.maxCompletionTokens !== undefined) {
    request.max_completion_tokens = config.maxCompletionTokens;
  }

  return request;
}
