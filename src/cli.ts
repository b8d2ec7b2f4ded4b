#!/usr/bin/env node
/// <reference types="node" />
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import pc from "picocolors";
import updateNotifier from "update-notifier";
import { loadConfig, type CliOptions } from "./config.js";
import { GitDiffSource, commitWithMessage } from "./git.js";
import { generate } from "./generator.js";
import { chooseSurface } from "./sink.js";
import { ClackNotifier, StreamNotifier } from "./notifier.js";

// Read and parse package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkgPath = join(__dirname, "..", "package.json");
const pkg: { name: string; version: string } = JSON.parse(readFileSync(pkgPath, "utf-8"));

// Check for updates and notify the user if a new version is available.
updateNotifier({ pkg }).notify();

interface RunOptions extends CliOptions {
  write?: string;
  commit?: boolean;
  dryRun?: boolean;
}

const program = new Command();

program
  .name("commitline")
  .usage("[options]")
  .description("One-line Conventional Commits messages from your staged diff")
  .version(pkg.version)
  // Do not set defaults here; loadConfig provides defaults and merges with .commitlinerc/env
  .option("--model <name>", "Model identifier sent to the completion endpoint")
  .option("--url <url>", "Chat completion endpoint URL")
  .option("--api-key-env <name>", "Environment variable holding the API key")
  .option("--max-tokens <number>", "Upper bound on generated tokens")
  .option("--max-diff-chars <number>", "Refuse diffs longer than this")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .option("--write <file>", "Replace the contents of <file> with the message")
  .option("--commit", "Commit the staged changes with the message")
  .option("--dry-run", "Show the message without writing or committing")
  .addHelpText(
    "after",
    `
    Examples:
      $ commitline                                  # Print a message for the staged diff
      $ commitline --commit                         # Generate and commit in one go
      $ commitline --write .git/COMMIT_EDITMSG      # Fill the commit message file
      $ commitline --model gpt-4o-mini --max-tokens 60
  `
  )
  .action(async (options: RunOptions) => {
    // Piped stdout gets the bare message; progress goes to stderr
    const { target, plain } = chooseSurface(options, process.stdout);

    if (!plain) p.intro(pc.bgCyan(pc.black(" commitline ")));

    try {
      const config = await loadConfig(options);

      const result = await generate(target, {
        config,
        source: new GitDiffSource(process.cwd(), config.ignoredFiles),
        notifier: plain ? new StreamNotifier(process.stderr) : new ClackNotifier(),
      });

      if (!result.ok) {
        const warning = result.error.severity === "warn";
        if (!plain) {
          if (result.error.kind === "NoStagedChanges") {
            p.note("Stage your changes first:\n\n  " + pc.cyan("git add <files>"), "Nothing to commit");
          }
          p.outro(warning ? pc.yellow("Exiting...") : pc.red("Failed"));
        }
        process.exit(warning ? 0 : 1);
      }

      if (plain) {
        if (options.commit && !options.dryRun) await commitWithMessage(result.message);
        return;
      }

      p.note(result.lines.join("\n"), options.write && !options.dryRun ? `Wrote ${options.write}` : "Commit message");

      if (options.commit && !options.dryRun) {
        const s = p.spinner();
        s.start("Committing");
        await commitWithMessage(result.message);
        s.stop("Committed successfully");
      }

      p.outro(pc.green(options.dryRun ? "Dry run complete" : "✓ Done!"));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      if (plain) {
        process.stderr.write(pc.red(`[commitline] Error: ${msg}`) + "\n");
      } else {
        p.log.error(pc.red(`Error: ${msg}`));
        p.outro(pc.red("Failed"));
      }
      process.exit(1);
    }
  });

program
  .command("init")
  .description("Create a .commitlinerc in the current directory")
  .action(async () => {
    const { runInit } = await import("./init.js");
    await runInit();
  });

await program.parseAsync();
