import prompts from "prompts";
import { missingInput } from "../errors/catalog.js";
import type { CredentialPrompter } from "../ports/prompt.js";
import type { RepositoryCredential } from "../credential-store.js";

/**
 * Real prompt service using the 'prompts' package.
 * Aborting a question (Ctrl+C) or leaving it empty counts as missing input.
 * Questions are drawn on stderr so stdout keeps only command results.
 */
export const interactivePrompts: CredentialPrompter = {
  async promptCredential(url: string): Promise<RepositoryCredential> {
    let cancelled = false;
    const answers: { username?: unknown; password?: unknown } = await prompts(
      [
        {
          type: "text",
          name: "username",
          message: `Username for ${url}`,
          stdout: process.stderr,
        },
        {
          type: "password",
          name: "password",
          message: "Password",
          stdout: process.stderr,
        },
      ],
      {
        onCancel: () => {
          cancelled = true;
          return false;
        },
      }
    );

    const username = typeof answers.username === "string" ? answers.username.trim() : "";
    const password = typeof answers.password === "string" ? answers.password.trim() : "";

    if (cancelled || username === "") {
      throw missingInput(`username for ${url}`);
    }
    if (password === "") {
      throw missingInput(`password for ${url}`);
    }

    return { url, username, password };
  },
};
