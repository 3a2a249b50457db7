import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import { interactivePrompts, nodeFetch } from "../lib/adapters/index.js";
import { parseDownloadUrl, parseRepoUrl } from "../lib/armory-url.js";
import { login } from "../lib/auth-client.js";
import { createContextLogger, isJsonMode, isNonInteractive } from "../lib/cli-context.js";
import {
  FileCredentialStore,
  type CredentialStore,
  type RepositoryCredential,
} from "../lib/credential-store.js";
import { download, type DownloadResult } from "../lib/downloader.js";
import { hasErrorCode } from "../lib/errors/types.js";
import { outputJson, type DownloadJsonData } from "../lib/json-output.js";
import type { Logger } from "../lib/logger.js";
import type { CredentialPrompter, FetchFn, ProgressReporter } from "../lib/ports/index.js";
import { createProgress, logProgress } from "../lib/progress.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  output?: string;
  dir?: string;
  repo?: string;
}

/**
 * Dependencies for the download flow.
 * All have defaults for production use.
 */
export interface DownloadCommandDeps {
  fetchImpl?: FetchFn;
  store?: CredentialStore;
  prompter?: CredentialPrompter;
  progress?: ProgressReporter;
  logger?: Logger;
  /** Whether prompting for credentials is allowed */
  interactive?: boolean;
  cwd?: string;
}

interface TokenDeps {
  fetchImpl: FetchFn;
  store: CredentialStore;
  prompter: CredentialPrompter;
  logger: Logger;
  interactive: boolean;
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

async function promptAndSave(
  repo: string,
  deps: TokenDeps
): Promise<RepositoryCredential> {
  const credential = await deps.prompter.promptCredential(repo);
  deps.store.save({ ...credential, url: repo });
  logProgress(chalk.green(`Credentials saved to ${deps.store.path}`));
  return credential;
}

/**
 * Obtain an access token for `repo`.
 *
 * Missing credentials are prompted for and persisted before logging in.
 * Rejected stored credentials get one more interactive attempt.
 */
export async function acquireToken(repo: string, deps: TokenDeps): Promise<string> {
  const { fetchImpl, logger } = deps;

  let stored: RepositoryCredential;
  try {
    stored = deps.store.load(repo);
  } catch (error) {
    if (!deps.interactive || !hasErrorCode(error, "CONFIG_NOT_FOUND")) {
      throw error;
    }
    logProgress(chalk.yellow(`No credentials stored for ${chalk.cyan(repo)}. Enter them to continue.`));
    const entered = await promptAndSave(repo, deps);
    return login(repo, entered.username, entered.password, { fetchImpl, logger });
  }

  try {
    return await login(repo, stored.username, stored.password, { fetchImpl, logger });
  } catch (error) {
    if (!deps.interactive || !hasErrorCode(error, "AUTH_REJECTED_CREDENTIALS")) {
      throw error;
    }
    logger.debug("Stored credentials rejected", { url: repo, reason: error.message });
    logProgress(chalk.yellow(`Stored credentials for ${chalk.cyan(repo)} were rejected. Enter them again.`));
    const entered = await promptAndSave(repo, deps);
    return login(repo, entered.username, entered.password, { fetchImpl, logger });
  }
}

// ---------------------------------------------------------------------------
// Download flow
// ---------------------------------------------------------------------------

/**
 * Authenticate against the armory that hosts `url` (if any) and download it.
 */
export async function runDownload(
  url: string,
  options: DownloadOptions,
  deps: DownloadCommandDeps = {}
): Promise<DownloadResult> {
  const logger = deps.logger ?? createContextLogger();
  const fetchImpl = deps.fetchImpl ?? nodeFetch;

  parseDownloadUrl(url);
  const repo = options.repo ? parseDownloadUrl(options.repo).origin : parseRepoUrl(url);

  let token: string | undefined;
  if (repo) {
    token = await acquireToken(repo, {
      fetchImpl,
      logger,
      store: deps.store ?? new FileCredentialStore(),
      prompter: deps.prompter ?? interactivePrompts,
      interactive: deps.interactive ?? !isNonInteractive(),
    });
  } else {
    logger.warn("Not an armory URL; downloading without credentials", { url });
  }

  return download(
    {
      token,
      sourceUrl: url,
      destinationDir: resolve(deps.cwd ?? process.cwd(), options.dir ?? "."),
      filename: options.output,
    },
    {
      fetchImpl,
      logger,
      progress: deps.progress ?? createProgress(),
    }
  );
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: DownloadCommandDeps = {}): void {
  program
    .argument("<url>", "Artifact URL to download")
    .option("-o, --output <name>", "Save under this filename instead of the one the server suggests")
    .option("-d, --dir <path>", "Directory to save into (default: current directory)")
    .option("--repo <baseUrl>", "Repository to log in to (default: derived from <url>)")
    .addHelpText(
      "after",
      "\nInterrupted downloads are kept as <filename>.part and resume on the next run.\n" +
        "Don't run two downloads of the same file into the same directory at once."
    )
    .action(async (url: string, options: DownloadOptions) => {
      const startedAt = Date.now();
      const result = await runDownload(url, options, deps);
      if (isJsonMode()) {
        const data: DownloadJsonData = result;
        outputJson(data, Date.now() - startedAt);
      }
    });
}
