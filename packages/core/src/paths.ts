import { join } from "node:path";
import { homedir } from "node:os";

/** Resolve the amie-usage home directory. Defaults to ~/.amie-usage. */
export function resolveAmieUsageHome(
  env: Record<string, string | undefined> = process.env,
): string {
  return env.AMIE_USAGE_HOME?.trim() || join(homedir(), ".amie-usage");
}

/** Resolve the log directory. */
export function resolveLogDir(
  env: Record<string, string | undefined> = process.env,
): string {
  return join(resolveAmieUsageHome(env), "logs");
}
