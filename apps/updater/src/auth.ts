import { Octokit } from "octokit";

/** Environment variables checked for the API token, in priority order. */
export const TOKEN_ENV_VARS = ["GITHUB_TOKEN", "TOKEN"] as const;

/**
 * Return the first non-blank token from the environment, trimmed.
 * Returns undefined when none of TOKEN_ENV_VARS is set.
 */
export function resolveToken(env: NodeJS.ProcessEnv): string | undefined {
  for (const name of TOKEN_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Octokit factory: bearer auth, no retries, rate limits are reported and
// fail the run
// ---------------------------------------------------------------------------

interface ThrottledRequest {
  method: string;
  url: string;
}

export function makeOctokit(token: string, fetchImpl?: typeof fetch): Octokit {
  const octokit = new Octokit({
    userAgent: "profile-readme-generator",
    request: fetchImpl ? { fetch: fetchImpl } : {},
    retry: { enabled: false },
    throttle: {
      onRateLimit: (retryAfter: number, options: ThrottledRequest) => {
        console.warn(
          `[throttle] Rate limit hit for ${options.method} ${options.url} - retry after ${retryAfter}s`
        );
        return false;
      },
      onSecondaryRateLimit: (retryAfter: number, options: ThrottledRequest) => {
        console.warn(
          `[throttle] Secondary rate limit for ${options.method} ${options.url} - retry after ${retryAfter}s`
        );
        return false;
      },
    },
  });

  // Octokit's own token auth sends "token <PAT>"; the GraphQL endpoint is
  // called with a bearer header instead.
  octokit.hook.before("request", (options) => {
    options.headers.authorization = `Bearer ${token}`;
  });
  return octokit;
}
