import { z } from "zod";
import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { credentialsNotFound, invalidCredentialFile, ioError } from "./errors/catalog.js";
import { describeCause } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CONFIG_DIR_NAME = ".amr";
export const CONFIG_FILE_NAME = "config.json";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const RepositoryCredentialSchema = z.object({
  url: z.string().min(1),
  username: z.string(),
  password: z.string(),
});

/** Complete credential file schema */
export const CredentialFileSchema = z.object({
  repositories: z.array(RepositoryCredentialSchema),
});

export type RepositoryCredential = z.infer<typeof RepositoryCredentialSchema>;
export type CredentialFile = z.infer<typeof CredentialFileSchema>;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface CredentialStore {
  /** Throws CONFIG_NOT_FOUND when nothing is stored for `url` */
  load(url: string): RepositoryCredential;
  /** Replace the entry with the same url, or append a new one */
  save(credential: RepositoryCredential): void;
  list(): RepositoryCredential[];
  remove(url: string): boolean;
  readonly path: string;
}

/**
 * Repository URLs are compared without surrounding whitespace or trailing slashes.
 */
export function normalizeRepoKey(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

/**
 * Resolve the base directory holding `.amr/`.
 * ARMORY_CONFIG_HOME wins over the user's home directory.
 */
export function resolveConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.ARMORY_CONFIG_HOME || homedir();
}

/**
 * Read and validate a credential file.
 * Returns undefined if the file doesn't exist.
 */
export function loadCredentialFile(path: string): CredentialFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw ioError("read", path, err);
  }

  if (content.trim() === "") {
    return { repositories: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw invalidCredentialFile(path, [`Invalid JSON: ${describeCause(err)}`]);
  }

  const result = CredentialFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
    );
    throw invalidCredentialFile(path, issues);
  }

  return result.data;
}

/**
 * Credentials persisted as JSON at `<home>/.amr/config.json`, owner-only.
 */
export class FileCredentialStore implements CredentialStore {
  readonly path: string;
  private readonly dir: string;

  constructor(configHome: string = resolveConfigHome()) {
    this.dir = join(configHome, CONFIG_DIR_NAME);
    this.path = join(this.dir, CONFIG_FILE_NAME);
  }

  load(url: string): RepositoryCredential {
    const key = normalizeRepoKey(url);
    const file = loadCredentialFile(this.path);
    const match = file?.repositories.find((repo) => normalizeRepoKey(repo.url) === key);
    if (!match) {
      throw credentialsNotFound(key, this.path);
    }
    return match;
  }

  save(credential: RepositoryCredential): void {
    const entry: RepositoryCredential = {
      url: normalizeRepoKey(credential.url),
      username: credential.username.trim(),
      password: credential.password.trim(),
    };

    const file = loadCredentialFile(this.path) ?? { repositories: [] };
    const index = file.repositories.findIndex(
      (repo) => normalizeRepoKey(repo.url) === entry.url
    );
    if (index === -1) {
      file.repositories.push(entry);
    } else {
      file.repositories[index] = entry;
    }

    this.write(file);
  }

  list(): RepositoryCredential[] {
    return loadCredentialFile(this.path)?.repositories ?? [];
  }

  remove(url: string): boolean {
    const key = normalizeRepoKey(url);
    const file = loadCredentialFile(this.path);
    if (!file) return false;

    const remaining = file.repositories.filter((repo) => normalizeRepoKey(repo.url) !== key);
    if (remaining.length === file.repositories.length) return false;

    this.write({ repositories: remaining });
    return true;
  }

  private write(file: CredentialFile): void {
    try {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
      writeFileSync(this.path, `${JSON.stringify(file, null, 2)}\n`, { mode: 0o600 });
      // mode only applies when the file is created
      if (process.platform !== "win32") {
        chmodSync(this.path, 0o600);
      }
    } catch (err) {
      throw ioError("write", this.path, err);
    }
  }
}
