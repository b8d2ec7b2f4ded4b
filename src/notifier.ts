import * as p from "@clack/prompts";
import pc from "picocolors";
import type { Writable } from "stream";

export interface Notifier {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ClackNotifier implements Notifier {
  info(message: string): void {
    p.log.info(message);
  }

  success(message: string): void {
    p.log.success(pc.green(message));
  }

  warn(message: string): void {
    p.log.warn(pc.yellow(message));
  }

  error(message: string): void {
    p.log.error(pc.red(message));
  }
}

// Plain prefixed lines, for when stdout is piped and clack's frames would get in the way.
export class StreamNotifier implements Notifier {
  constructor(private readonly stream: Writable) {}

  info(message: string): void {
    this.stream.write(`[commitline] ${message}\n`);
  }

  success(message: string): void {
    this.stream.write(pc.green(`[commitline] ${message}`) + "\n");
  }

  warn(message: string): void {
    this.stream.write(pc.yellow(`[commitline] ${message}`) + "\n");
  }

  error(message: string): void {
    this.stream.write(pc.red(`[commitline] ${message}`) + "\n");
  }
}

export const silentNotifier: Notifier = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
