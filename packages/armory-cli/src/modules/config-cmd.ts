import { Command } from "commander";
import chalk from "chalk";
import { existsSync } from "fs";
import { interactivePrompts } from "../lib/adapters/index.js";
import { parseDownloadUrl } from "../lib/armory-url.js";
import { isJsonMode, isNonInteractive } from "../lib/cli-context.js";
import { FileCredentialStore, type CredentialStore } from "../lib/credential-store.js";
import { credentialsNotFound, missingInput } from "../lib/errors/catalog.js";
import { outputJson, type RepositoryJsonData } from "../lib/json-output.js";
import type { CredentialPrompter } from "../lib/ports/index.js";

export interface ConfigCommandDeps {
  store?: CredentialStore;
  prompter?: CredentialPrompter;
  interactive?: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command, deps: ConfigCommandDeps = {}): void {
  // Resolved per action so ARMORY_CONFIG_HOME is read at run time
  const getStore = (): CredentialStore => deps.store ?? new FileCredentialStore();

  const config = program
    .command("config")
    .description("Manage stored repository credentials");

  config
    .command("set")
    .description("Prompt for and store credentials for a repository")
    .argument("<baseUrl>", "Repository address, e.g. https://armory.example.com")
    .addHelpText(
      "after",
      "\nCredentials are keyed by scheme, host and port. Entries stored as scheme://host\n" +
        "without the port don't match a repository on a non-default port; store them again."
    )
    .action(async (baseUrl: string) => {
      const url = parseDownloadUrl(baseUrl).origin;
      const interactive = deps.interactive ?? !isNonInteractive();
      if (!interactive) {
        throw missingInput(`credentials for ${url} (prompts are disabled)`);
      }

      const store = getStore();
      const prompter = deps.prompter ?? interactivePrompts;
      const credential = await prompter.promptCredential(url);
      store.save({ ...credential, url });
      console.log(chalk.green(`Saved credentials for ${url} to ${store.path}`));
    });

  config
    .command("list")
    .description("List repositories with stored credentials")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      const repositories = getStore().list();

      if (options.json || isJsonMode()) {
        const data: RepositoryJsonData[] = repositories.map(({ url, username }) => ({ url, username }));
        outputJson(data);
        return;
      }

      if (repositories.length === 0) {
        console.log(chalk.yellow("No repositories configured."));
        console.log(chalk.gray("Run 'armory-dl config set <baseUrl>' to add one."));
        return;
      }

      const width = Math.max(...repositories.map((repo) => repo.url.length));
      for (const repo of repositories) {
        console.log(`${chalk.cyan(repo.url.padEnd(width))}  ${repo.username}  ${chalk.gray("********")}`);
      }
    });

  config
    .command("remove")
    .description("Delete the stored credentials of a repository")
    .argument("<baseUrl>", "Repository address")
    .action((baseUrl: string) => {
      const url = parseDownloadUrl(baseUrl).origin;
      const store = getStore();
      if (!store.remove(url)) {
        throw credentialsNotFound(url, store.path);
      }
      console.log(chalk.green(`Removed credentials for ${url}`));
    });

  config
    .command("path")
    .description("Show the credential file location")
    .action(() => {
      const path = getStore().path;
      console.log(path);
      if (!existsSync(path)) {
        console.log(chalk.gray("(not created yet)"));
      }
    });
}
