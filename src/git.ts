import { execa } from "execa";
import { minimatch } from "minimatch";
import type { Config } from "./config.js";
import {
  CollectorShapeError,
  DiffTooLargeError,
  NoStagedChangesError,
} from "./errors.js";

/**
 * Whatever supplies the staged diff. Implementations are expected to resolve
 * to the diff as a list of lines; anything else is rejected by `collectDiff`.
 */
export interface DiffSource {
  stagedDiff(): Promise<unknown>;
}

export class GitDiffSource implements DiffSource {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly ignoredPatterns: string[] = []
  ) {}

  async stagedDiff(): Promise<string[]> {
    const { stdout } = await execa("git", ["diff", "--cached", "--unified=3"], {
      cwd: this.cwd,
    });

    const diff = filterDiff(stdout, this.ignoredPatterns);
    return diff ? diff.split("\n") : [];
  }
}

function describeShape(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "a list with non-text entries";
  return typeof value;
}

function isLineList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((line) => typeof line === "string");
}

/** Fetches the staged diff from `source` and joins it into one text blob. */
export async function collectDiff(
  source: DiffSource,
  config: Pick<Config, "maxDiffChars"> = {}
): Promise<string> {
  const lines = await source.stagedDiff();

  if (!isLineList(lines)) throw new CollectorShapeError(describeShape(lines));
  if (lines.length === 0) throw new NoStagedChangesError();

  const diff = lines.join("\n");
  if (config.maxDiffChars !== undefined && diff.length > config.maxDiffChars) {
    throw new DiffTooLargeError(diff.length, config.maxDiffChars);
  }

  return diff;
}

// Header looks like: diff --git a/path/to/file b/path/to/file
function chunkPaths(header: string): string[] {
  const match = header.match(/^a\/(.+?) b\/(.+)$/);
  return match ? [match[1], match[2]] : [header];
}

/** Drops the per-file sections of a unified diff whose path matches an ignore pattern. */
export function filterDiff(fullDiff: string, ignoredPatterns: string[]): string {
  if (ignoredPatterns.length === 0) return fullDiff;

  // split consumes the separator, so it is re-added per kept chunk
  const chunks = fullDiff.split(/^diff --git /m);

  return chunks
    .map((chunk, i) => {
      if (!chunk.trim()) return "";
      // anything before the first header is not a file section
      if (i === 0 && !fullDiff.startsWith("diff --git ")) return chunk;

      const paths = chunkPaths(chunk.split("\n")[0]);
      const ignored = paths.every((path) =>
        ignoredPatterns.some((pattern) => minimatch(path, pattern))
      );
      return ignored ? "" : `diff --git ${chunk}`;
    })
    .join("")
    .replace(/\n+$/, "");
}

export async function commitWithMessage(
  message: string,
  cwd: string = process.cwd()
): Promise<void> {
  await execa("git", ["commit", "-m", message], { cwd });
}
