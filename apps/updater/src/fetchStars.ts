import { RepoStarsPageSchema, type RepoStarsPage } from "@profile-readme/shared";
import type { GraphQLClient } from "./graphql.js";
import { ApiError, NotFoundError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";

export const STARS_PAGE_SIZE = 100;

const STARS_QUERY = `
  query ($login: String!, $cursor: String) {
    user(login: $login) {
      repositories(
        first: ${STARS_PAGE_SIZE}
        after: $cursor
        ownerAffiliations: OWNER
        isFork: false
        orderBy: { field: UPDATED_AT, direction: DESC }
      ) {
        nodes {
          stargazerCount
        }
        pageInfo {
          hasNextPage
          endCursor
        }
      }
    }
  }
`;

/**
 * Sum the stargazers of every non-fork repository the user owns.
 * Walks the connection page by page until `hasNextPage` is false.
 */
export async function fetchTotalStars(
  client: GraphQLClient,
  login: string,
  log: Logger = defaultLogger
): Promise<number> {
  let total = 0;
  let cursor: string | null = null;
  let page = 0;

  for (;;) {
    page++;
    const response: RepoStarsPage = await client.execute(STARS_QUERY, { login, cursor }, RepoStarsPageSchema);
    if (!response.user) {
      throw new NotFoundError(login, "fetching repositories");
    }

    const { nodes, pageInfo } = response.user.repositories;
    for (const repo of nodes) {
      if (repo) total += repo.stargazerCount;
    }
    log.info(`[stars] Page ${page}: ${nodes.length} repos, running total ${total}`);

    if (!pageInfo.hasNextPage) break;
    if (pageInfo.endCursor === null) {
      throw new ApiError(`Repository page ${page} reported more pages but no end cursor`);
    }
    cursor = pageInfo.endCursor;
  }

  return total;
}
