import { loadSettings } from "./config/settingsLoader.js";
import type { LoadSettingsOptions } from "./config/settingsLoader.js";
import { ConfigNotFoundError, GeneratorError, UsageError } from "./errors.js";
import { generatePage } from "./generator/pageGenerator.js";

export const USAGE = `Pitch page generator
Creates a client pitch page from the shared template and the client's config file.

Usage:
    pitchdeck <client-slug>

Example:
    pitchdeck example-client

Output:
    clients/<slug>/index.html   (the pitch page)
    clients/<slug>/audio/       (copied from configs/<slug>/audio/)
`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "generate"; slug: string };

export function parseArgs(argv: readonly string[]): CliCommand {
  if (argv.length !== 1) {
    throw new UsageError(`Expected exactly one client slug, got ${argv.length} argument(s)`);
  }
  const [arg] = argv;
  if (arg === "-h" || arg === "--help") return { kind: "help" };
  return { kind: "generate", slug: arg };
}

function reportFailure(err: GeneratorError): void {
  if (err instanceof UsageError) {
    console.log(USAGE);
    return;
  }
  console.error(`[pitchdeck] Error: ${err.message}`);
  if (err instanceof ConfigNotFoundError) {
    console.error("[pitchdeck] Create it first (copy an existing config as a starting point).");
  }
}

/**
 * Run one CLI invocation and return the process exit code. Failures outside
 * the GeneratorError family are rethrown.
 */
export function runCli(argv: readonly string[], options: LoadSettingsOptions = {}): number {
  try {
    const command = parseArgs(argv);
    if (command.kind === "help") {
      console.log(USAGE);
      return 0;
    }

    const settings = loadSettings(options);
    generatePage(command.slug, settings);
    return 0;
  } catch (err) {
    if (err instanceof GeneratorError) {
      reportFailure(err);
      return 1;
    }
    throw err;
  }
}
