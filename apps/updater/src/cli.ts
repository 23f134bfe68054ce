import { parseArgs as nodeParseArgs } from "node:util";
import { ConfigurationError } from "./errors.js";

export interface CliArgs {
  template?: string;
  readme?: string;
  login?: string;
  dryRun: boolean;
  help: boolean;
}

export const HELP_TEXT = `Usage: update-readme [options]

Regenerate README.md from TEMPLATE.md, filling {{ STARS }} and {{ COMMITS }}
with the account's GitHub stats.

Options:
  --template <path>   Template file (default: TEMPLATE.md)
  --readme <path>     Output file (default: README.md)
  --login <login>     GitHub user to fetch stats for (default: $GITHUB_REPOSITORY_OWNER)
  --dry-run           Print the rendered README instead of writing it
  --help, -h          Show this help message

Environment:
  GITHUB_TOKEN or TOKEN     API token (required)
  GITHUB_REPOSITORY_OWNER   Fallback for --login
`;

function parseFlags(argv: string[]) {
  try {
    return nodeParseArgs({
      args: argv,
      options: {
        template: { type: "string" },
        readme: { type: "string" },
        login: { type: "string" },
        "dry-run": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (err) {
    // node:util reports unknown flags and missing values as TypeError
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseFlags(argv);
  return {
    template: values.template,
    readme: values.readme,
    login: values.login,
    dryRun: values["dry-run"] ?? false,
    help: values.help ?? false,
  };
}
