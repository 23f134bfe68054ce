import { ConfigSchema, type Config } from "@profile-readme/shared";
import type { CliArgs } from "./cli.js";
import { resolveToken } from "./auth.js";
import { ConfigurationError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";

/** Environment variable used when --login is not passed. */
export const LOGIN_ENV_VAR = "GITHUB_REPOSITORY_OWNER";

/**
 * Merge CLI flags and environment into a validated Config.
 * Throws ConfigurationError naming the first missing or invalid value.
 */
export function resolveConfig(
  args: CliArgs,
  env: NodeJS.ProcessEnv,
  log: Logger = defaultLogger
): Config {
  const result = ConfigSchema.safeParse({
    templatePath: args.template,
    readmePath: args.readme,
    login: args.login ?? env[LOGIN_ENV_VAR],
    token: resolveToken(env),
    dryRun: args.dryRun,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue ? issue.message : result.error.message);
  }

  log.info(
    `[config] login=${result.data.login} template=${result.data.templatePath} readme=${result.data.readmePath}` +
      (result.data.dryRun ? " (dry run)" : "")
  );
  return result.data;
}
