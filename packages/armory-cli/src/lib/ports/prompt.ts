import type { RepositoryCredential } from "../credential-store.js";

/**
 * Abstraction for interactive credential entry.
 * Allows testing login flows without a terminal.
 */
export interface CredentialPrompter {
  /** Ask the user for the username and password of a repository */
  promptCredential(url: string): Promise<RepositoryCredential>;
}
