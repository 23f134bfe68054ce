import {
  CommitContributionsSchema,
  UserCreatedAtSchema,
  parseTimestamp,
  toGitHubTimestamp,
  yearWindows,
} from "@profile-readme/shared";
import type { GraphQLClient } from "./graphql.js";
import { NotFoundError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";

const CREATED_AT_QUERY = `
  query ($login: String!) {
    user(login: $login) {
      createdAt
    }
  }
`;

const CONTRIBUTIONS_QUERY = `
  query ($login: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $login) {
      contributionsCollection(from: $from, to: $to) {
        totalCommitContributions
      }
    }
  }
`;

/** Fetch when the account was created. */
export async function fetchUserCreatedAt(client: GraphQLClient, login: string): Promise<Date> {
  const response = await client.execute(CREATED_AT_QUERY, { login }, UserCreatedAtSchema);
  if (!response.user) {
    throw new NotFoundError(login, "fetching creation date");
  }
  return parseTimestamp(response.user.createdAt);
}

/**
 * Sum commit contributions over the whole life of the account.
 *
 * contributionsCollection only answers for ranges of at most a year, so the
 * range from account creation to `now` is queried one calendar year at a time.
 * An account created after `now` has no windows and counts zero commits.
 */
export async function fetchCommitTotal(
  client: GraphQLClient,
  login: string,
  now: Date = new Date(),
  log: Logger = defaultLogger
): Promise<number> {
  const createdAt = await fetchUserCreatedAt(client, login);
  const windows = yearWindows(createdAt, now);
  log.info(
    `[commits] Account created ${toGitHubTimestamp(createdAt)}, querying ${windows.length} window(s)`
  );

  let total = 0;
  for (const window of windows) {
    const from = toGitHubTimestamp(window.from);
    const to = toGitHubTimestamp(window.to);
    const response = await client.execute(
      CONTRIBUTIONS_QUERY,
      { login, from, to },
      CommitContributionsSchema
    );
    if (!response.user) {
      throw new NotFoundError(login, "fetching contributions");
    }
    const count = response.user.contributionsCollection.totalCommitContributions;
    total += count;
    log.info(`[commits] ${from} -> ${to}: ${count}`);
  }

  return total;
}
