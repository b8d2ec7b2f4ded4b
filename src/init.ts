import { writeFileSync, existsSync } from "fs";
import { join } from "path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { DEFAULT_ENV_VAR, DEFAULT_URL, getDefaults } from "./config.js";

export interface RcFile {
  model: string;
  url?: string;
  envVar?: string;
  maxCompletionTokens?: number;
}

export interface InitAnswers {
  model: string;
  url: string;
  envVar: string;
  maxTokens: string;
}

// Only values that differ from the built-in defaults end up in the file.
export function buildRcFile(answers: InitAnswers): RcFile {
  const rc: RcFile = { model: answers.model.trim() };

  const url = answers.url.trim();
  if (url && url !== DEFAULT_URL) rc.url = url;

  const envVar = answers.envVar.trim();
  if (envVar && envVar !== DEFAULT_ENV_VAR) rc.envVar = envVar;

  const maxTokens = answers.maxTokens.trim();
  if (maxTokens) rc.maxCompletionTokens = Number(maxTokens);

  return rc;
}

export async function runInit(cwd: string = process.cwd()): Promise<void> {
  p.intro(pc.bgCyan(pc.black(" commitline init ")));

  const configPath = join(cwd, ".commitlinerc");

  if (existsSync(configPath)) {
    const shouldOverwrite = await p.confirm({
      message: ".commitlinerc already exists. Overwrite?",
      initialValue: false,
    });

    if (p.isCancel(shouldOverwrite) || !shouldOverwrite) {
      p.outro(pc.yellow("Operation cancelled"));
      return;
    }
  }

  const defaults = getDefaults();

  const answers = await p.group(
    {
      model: () =>
        p.text({
          message: "Enter model name:",
          initialValue: defaults.model,
          placeholder: defaults.model,
          validate: (value) => {
            if (!value) return "Model name is required";
          },
        }),
      url: () =>
        p.text({
          message: "Chat completion endpoint:",
          initialValue: defaults.url,
          validate: (value) => {
            if (!URL.canParse(value)) return "Please enter a valid URL";
          },
        }),
      envVar: () =>
        p.text({
          message: "Environment variable holding the API key:",
          initialValue: defaults.envVar,
        }),
      maxTokens: () =>
        p.text({
          message: "Max completion tokens (leave empty for no limit):",
          placeholder: "",
          validate: (value) => {
            if (value && !(Number.isInteger(Number(value)) && Number(value) > 0))
              return "Please enter a positive whole number";
          },
        }),
    },
    {
      onCancel: () => {
        p.outro(pc.yellow("Operation cancelled"));
        process.exit(0);
      },
    }
  );

  const rc = buildRcFile({
    model: String(answers.model),
    url: String(answers.url),
    envVar: String(answers.envVar ?? ""),
    maxTokens: String(answers.maxTokens ?? ""),
  });

  writeFileSync(configPath, JSON.stringify(rc, null, 2) + "\n");

  p.note(JSON.stringify(rc, null, 2), "Generated .commitlinerc");
  p.outro(pc.green("Configuration initialized successfully!"));
}
