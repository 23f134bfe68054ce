import { z } from "zod";

// --- Config ---

export const ConfigSchema = z.object({
  templatePath: z.string().min(1).default("TEMPLATE.md"),
  readmePath: z.string().min(1).default("README.md"),
  token: z
    .string({
      required_error: "Missing GITHUB_TOKEN environment variable for GitHub API access.",
    })
    .trim()
    .min(1, "Missing GITHUB_TOKEN environment variable for GitHub API access."),
  login: z
    .string({
      required_error: "GitHub login is not specified. Pass --login or set GITHUB_REPOSITORY_OWNER.",
    })
    .trim()
    .min(1, "GitHub login is not specified. Pass --login or set GITHUB_REPOSITORY_OWNER."),
  dryRun: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

// --- GraphQL envelope ---

export const GraphQLEnvelopeSchema = z.object({
  data: z.record(z.unknown()).nullable().optional(),
  errors: z.array(z.unknown()).optional(),
});

export type GraphQLEnvelope = z.infer<typeof GraphQLEnvelopeSchema>;

// --- User creation date ---

export const UserCreatedAtSchema = z.object({
  user: z
    .object({
      createdAt: z.string().datetime({ offset: true }),
    })
    .nullable(),
});

export type UserCreatedAt = z.infer<typeof UserCreatedAtSchema>;

// --- Commit contributions for one window ---

export const CommitContributionsSchema = z.object({
  user: z
    .object({
      contributionsCollection: z.object({
        totalCommitContributions: z.number().int().min(0),
      }),
    })
    .nullable(),
});

export type CommitContributions = z.infer<typeof CommitContributionsSchema>;

// --- Owned repository stars (one page) ---

export const RepoStarNodeSchema = z.object({
  stargazerCount: z.number().int().min(0),
});

export type RepoStarNode = z.infer<typeof RepoStarNodeSchema>;

export const PageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable(),
});

export type PageInfo = z.infer<typeof PageInfoSchema>;

export const RepoStarsPageSchema = z.object({
  user: z
    .object({
      repositories: z.object({
        nodes: z.array(RepoStarNodeSchema.nullable()),
        pageInfo: PageInfoSchema,
      }),
    })
    .nullable(),
});

export type RepoStarsPage = z.infer<typeof RepoStarsPageSchema>;

// --- Stats result ---

export const ReadmeStatsSchema = z.object({
  stars: z.number().int().min(0),
  commits: z.number().int().min(0),
});

export type ReadmeStats = z.infer<typeof ReadmeStatsSchema>;
