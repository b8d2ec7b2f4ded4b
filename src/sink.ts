import { writeFile } from "fs/promises";
import type { Writable } from "stream";

/** An editable text target whose whole contents can be swapped out. */
export interface TextSurface {
  replaceLines(lines: string[]): void | Promise<void>;
}

export class BufferSurface implements TextSurface {
  lines: string[] = [];

  replaceLines(lines: string[]): void {
    this.lines = [...lines];
  }
}

// For COMMIT_EDITMSG and the file git hands to a prepare-commit-msg hook.
export class FileSurface implements TextSurface {
  constructor(readonly path: string) {}

  async replaceLines(lines: string[]): Promise<void> {
    await writeFile(this.path, lines.join("\n") + "\n", "utf-8");
  }
}

export class StreamSurface implements TextSurface {
  constructor(private readonly stream: Writable) {}

  replaceLines(lines: string[]): Promise<void> {
    const text = lines.map((line) => line + "\n").join("");
    // Settles once the stream has taken the chunk
    return new Promise((resolve, reject) => {
      this.stream.write(text, (err) => (err ? reject(err) : resolve()));
    });
  }
}

export async function deliver(target: TextSurface, message: string): Promise<void> {
  await target.replaceLines(message.split("\n"));
}

export interface OutputChoice {
  target: TextSurface;
  // true when stdout carries only the message (piped, no --write)
  plain: boolean;
}

/**
 * Picks where the CLI puts the message: the `--write` file, bare lines on a
 * piped stdout, or an in-memory buffer that the CLI shows in a note.
 */
export function chooseSurface(
  options: { write?: string; dryRun?: boolean },
  stdout: Writable & { isTTY?: boolean }
): OutputChoice {
  if (options.write) {
    return {
      target: options.dryRun ? new BufferSurface() : new FileSurface(options.write),
      plain: false,
    };
  }
  if (!stdout.isTTY) return { target: new StreamSurface(stdout), plain: true };
  return { target: new BufferSurface(), plain: false };
}
