export { generate } from "./generator.js";
export type { GenerateOptions, GenerateResult, PipelineState } from "./generator.js";
export {
  getDefaults,
  setDefaults,
  resetDefaults,
  mergeConfig,
  loadConfig,
} from "./config.js";
export type { Config, ConfigOverrides } from "./config.js";
export { resolveCredential } from "./credentials.js";
export { GitDiffSource, collectDiff, filterDiff, commitWithMessage } from "./git.js";
export type { DiffSource } from "./git.js";
export { SYSTEM_PROMPT, buildRequest } from "./engines/prompt.js";
export type { CompletionRequest } from "./engines/prompt.js";
export { sendCompletion } from "./engines/completion-client.js";
export type { CompletionResponse, FetchLike } from "./engines/completion-client.js";
export { extractMessage } from "./engines/extract.js";
export { BufferSurface, FileSurface, StreamSurface, chooseSurface, deliver } from "./sink.js";
export type { OutputChoice } from "./sink.js";
export type { TextSurface } from "./sink.js";
export { ClackNotifier, StreamNotifier, silentNotifier } from "./notifier.js";
export type { Notifier } from "./notifier.js";
export * from "./errors.js";
