import { getDefaults, mergeConfig, type ConfigOverrides } from "./config.js";
import { resolveCredential } from "./credentials.js";
import { CommitlineError } from "./errors.js";
import { GitDiffSource, collectDiff, type DiffSource } from "./git.js";
import { buildRequest } from "./engines/prompt.js";
import { sendCompletion, type FetchLike } from "./engines/completion-client.js";
import { extractMessage } from "./engines/extract.js";
import { deliver, type TextSurface } from "./sink.js";
import { silentNotifier, type Notifier } from "./notifier.js";

export type PipelineState =
  | "Idle"
  | "ResolvingCredential"
  | "CollectingDiff"
  | "BuildingRequest"
  | "Sending"
  | "ValidatingResponse"
  | "Delivering"
  | "Done";

export type GenerateResult =
  | { ok: true; message: string; lines: string[] }
  | { ok: false; error: CommitlineError; failedAt: PipelineState };

export interface GenerateOptions {
  config?: ConfigOverrides;
  // Defaults to `git diff --cached` in the current directory
  source?: DiffSource;
  notifier?: Notifier;
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs the whole pipeline once: credential, staged diff, request, response,
 * delivery. Known failures come back as `{ ok: false }` after one warning or
 * error notification; the target is only written once the response is valid.
 */
export async function generate(
  target: TextSurface,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const config = mergeConfig(getDefaults(), options.config);
  const notifier = options.notifier ?? silentNotifier;
  const source = options.source ?? new GitDiffSource(process.cwd(), config.ignoredFiles);

  let state: PipelineState = "Idle";

  try {
    state = "ResolvingCredential";
    const credential = resolveCredential(config, options.env);

    state = "CollectingDiff";
    const diff = await collectDiff(source, config);

    notifier.info("Generating commit message...");

    state = "BuildingRequest";
    const request = buildRequest(config, diff);

    state = "Sending";
    const response = await sendCompletion(request, credential, config, options.fetch);

    state = "ValidatingResponse";
    const message = extractMessage(response);

    state = "Delivering";
    await deliver(target, message);

    state = "Done";
    notifier.success("Commit message generated!");
    return { ok: true, message, lines: message.split("\n") };
  } catch (error) {
    if (!(error instanceof CommitlineError)) throw error;

    if (error.severity === "warn") notifier.warn(error.message);
    else notifier.error(error.message);

    return { ok: false, error, failedAt: state };
  }
}
