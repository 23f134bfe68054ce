import { ReadmeStatsSchema, type Config, type ReadmeStats } from "@profile-readme/shared";
import { makeOctokit } from "./auth.js";
import { HELP_TEXT, parseCliArgs } from "./cli.js";
import { resolveConfig } from "./config.js";
import { fetchCommitTotal } from "./fetchCommits.js";
import { fetchTotalStars } from "./fetchStars.js";
import { readText, writeText } from "./fileio.js";
import { GraphQLClient, octokitTransport, type GraphQLTransport } from "./graphql.js";
import { createLogger, defaultLogger, type Logger } from "./logger.js";
import { findPlaceholders, renderTemplate } from "./render.js";

/** Builds the transport once a token is known. */
export type TransportFactory = (token: string) => GraphQLTransport;

export const defaultTransportFactory: TransportFactory = (token) =>
  octokitTransport(makeOctokit(token));

/** Fetch both totals. Stars first, then commits; either failure aborts. */
export async function fetchStats(
  client: GraphQLClient,
  login: string,
  now: Date = new Date(),
  log: Logger = defaultLogger
): Promise<ReadmeStats> {
  log.info(`[main] Fetching stats for ${login} …`);
  const stars = await fetchTotalStars(client, login, log);
  const commits = await fetchCommitTotal(client, login, now, log);
  log.info(`[main] Total stars: ${stars}`);
  log.info(`[main] Total commits: ${commits}`);
  return ReadmeStatsSchema.parse({ stars, commits });
}

/**
 * Fetch stats, render the template and write the README.
 * Nothing is read or written until both totals are known. A dry run prints
 * the README to stdout instead, so progress should go through a stderr logger.
 */
export async function updateReadme(
  config: Config,
  client: GraphQLClient,
  now: Date = new Date(),
  log: Logger = defaultLogger
): Promise<ReadmeStats> {
  const stats = await fetchStats(client, config.login, now, log);

  const template = await readText(config.templatePath);
  const values = { STARS: stats.stars, COMMITS: stats.commits };
  const rendered = renderTemplate(template, values);

  const unresolved = findPlaceholders(template).filter((name) => !(name in values));
  if (unresolved.length > 0) {
    log.warn(`[render] Left unknown placeholder(s) untouched: ${unresolved.join(", ")}`);
  }

  if (config.dryRun) {
    process.stdout.write(rendered);
    log.info(`[main] Dry run: ${config.readmePath} not written`);
    return stats;
  }

  await writeText(config.readmePath, rendered);
  log.info(`[main] Updated ${config.readmePath} from ${config.templatePath} with latest stats.`);
  return stats;
}

/**
 * Command-line entry: parse flags, resolve config, run the update.
 * Configuration is checked before any transport is created.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv,
  createTransport: TransportFactory = defaultTransportFactory
): Promise<ReadmeStats | null> {
  const args = parseCliArgs(argv);
  if (args.help) {
    process.stdout.write(HELP_TEXT);
    return null;
  }

  const log = createLogger({ infoToStderr: args.dryRun });
  log.info("=== Profile README updater ===");
  const config = resolveConfig(args, env, log);
  const client = new GraphQLClient(createTransport(config.token));
  return updateReadme(config, client, new Date(), log);
}
