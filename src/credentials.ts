import { DEFAULT_ENV_VAR, type Config } from "./config.js";
import { MissingCredentialError } from "./errors.js";

/**
 * Picks the API key for this run: the explicit `apiKey` when it is non-empty,
 * otherwise the environment variable named by `envVar`.
 */
export function resolveCredential(
  config: Pick<Config, "apiKey" | "envVar">,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (config.apiKey) return config.apiKey;

  const envVar = config.envVar || DEFAULT_ENV_VAR;
  const value = env[envVar];
  if (!value) throw new MissingCredentialError(envVar);

  return value;
}
