import { isLinkshelfError, ValidationError } from "../domain/models/errors";
import { parseCommand } from "../domain/services/command-parser";
import {
  executeOperation,
  type CommandEnvironment
} from "../domain/services/command-interpreter";
import { createPrompter, type Prompter } from "../platform/confirm-prompt";
import { fetchPageTitle } from "../platform/page-title";
import {
  loadStore as defaultLoadStore,
  saveStore as defaultSaveStore
} from "../platform/store-file";
import { openUrl } from "../platform/url-opener";
import { resolveRuntimeConfig, type RuntimeConfig } from "../shared/config";

export const USAGE = [
  "usage:",
  "  linkshelf add <url> [-c comment] [-t title] [-tg \"tag-id|tag-name ...\"]",
  "  linkshelf update <id> [-c comment] [-t title] [-tg \"tag-id|tag-name ...\"]",
  "  linkshelf remove <id>",
  "  linkshelf open <id>",
  "  linkshelf list <term|all>",
  "  linkshelf list -tg \"tag-id|tag-name ...\"",
  "  linkshelf tag add <name>",
  "  linkshelf tag rename <id|name> <new-name>",
  "  linkshelf tag remove <id|name>",
  "  linkshelf tag list all",
  "  linkshelf tag <bookmark-id> <tag-id|tag-name>"
];

const HELP_FLAGS = new Set(["help", "--help", "-h"]);

export type CliDependencies = CommandEnvironment & {
  config: RuntimeConfig;
  loadStore: typeof defaultLoadStore;
  saveStore: typeof defaultSaveStore;
};

function createDefaultDependencies(prompter: Prompter): CliDependencies {
  const config = resolveRuntimeConfig();

  return {
    config,
    now: () => new Date(),
    print: (line) => console.log(line),
    confirm: (question) => prompter.confirm(question),
    fetchTitle: (url) => fetchPageTitle(url, { userAgent: config.userAgent }),
    openUrl: (url) => openUrl(url),
    loadStore: defaultLoadStore,
    saveStore: defaultSaveStore
  };
}

function reportFailure(error: unknown, argv: readonly string[]): number {
  if (isLinkshelfError(error)) {
    console.error(`error: ${error.message}`);
    if (error instanceof ValidationError && argv.length === 0) {
      console.error(USAGE.join("\n"));
    }
    return error.exitCode;
  }

  console.error("Unexpected failure", error);
  return 1;
}

/**
 * Runs one command end to end: parse, load the store, execute, and write the
 * store back when the command changed it. Resolves with the exit status.
 */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  if (argv.length > 0 && HELP_FLAGS.has(argv[0])) {
    const print = overrides.print ?? ((line: string) => console.log(line));
    USAGE.forEach((line) => print(line));
    return 0;
  }

  const prompter = createPrompter();

  try {
    const operation = parseCommand(argv);
    const dependencies: CliDependencies = {
      ...createDefaultDependencies(prompter),
      ...overrides
    };
    const { storePath } = dependencies.config;

    const loaded = await dependencies.loadStore(storePath, dependencies.confirm);
    if (loaded.status === "declined") {
      return 0;
    }

    const outcome = await executeOperation(operation, loaded.store, dependencies);

    if (outcome.status === "changed") {
      await dependencies.saveStore(storePath, loaded.store);
    } else if (outcome.status === "aborted") {
      dependencies.print("Nothing changed.");
    }

    return 0;
  } catch (error) {
    return reportFailure(error, argv);
  } finally {
    prompter.close();
  }
}
