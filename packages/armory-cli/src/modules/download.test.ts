import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Command } from "commander";
import { acquireToken, registerDownloadCommand, runDownload } from "./download.js";
import { LOGIN_PATH } from "../lib/auth-client.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { credentialsNotFound } from "../lib/errors/catalog.js";
import type { CredentialStore, RepositoryCredential } from "../lib/credential-store.js";
import { createNoopLogger } from "../lib/logger.js";
import type { CredentialPrompter } from "../lib/ports/prompt.js";
import type { FetchFn, HttpRequestInit, HttpResponse } from "../lib/ports/http.js";
import { SilentProgress } from "../lib/progress.js";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const REPO = "https://armory.example.com";
const FILE_URL = `${REPO}/files/tool-1.0.tar.gz`;

class MemoryStore implements CredentialStore {
  readonly path = "/home/test/.amr/config.json";
  readonly entries: RepositoryCredential[] = [];

  load(url: string): RepositoryCredential {
    const match = this.entries.find((entry) => entry.url === url);
    if (!match) throw credentialsNotFound(url, this.path);
    return match;
  }

  save(credential: RepositoryCredential): void {
    const index = this.entries.findIndex((entry) => entry.url === credential.url);
    if (index === -1) this.entries.push(credential);
    else this.entries[index] = credential;
  }

  list(): RepositoryCredential[] {
    return [...this.entries];
  }

  remove(url: string): boolean {
    const index = this.entries.findIndex((entry) => entry.url === url);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    return true;
  }
}

function response(status: number, text: string, headers: Record<string, string> = {}): HttpResponse {
  const lower = new Map(Object.entries(headers).map(([k, v]): [string, string] => [k.toLowerCase(), v]));
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Unauthorized",
    headers: { get: (name) => lower.get(name.toLowerCase()) ?? null },
    body: (async function* () {
      yield Buffer.from(text);
    })(),
    text: async () => text,
    discard: async () => {},
  };
}

function loginSuccess(token: string): HttpResponse {
  return response(
    200,
    JSON.stringify({
      status: 200,
      message: "OK",
      data: { id: 1, username: "alice", jti: "j", accessToken: token, refreshToken: "r" },
    })
  );
}

/**
 * Armory stand-in: accepts `test-secret` for alice, serves one file.
 */
function armory(content = "artifact-bytes") {
  return vi.fn<FetchFn>(async (url: string, init?: HttpRequestInit) => {
    if (url.endsWith(LOGIN_PATH)) {
      const body: unknown = JSON.parse(init?.body ?? "{}");
      const accepted =
        typeof body === "object" && body !== null && "password" in body && body.password === "test-secret";
      return accepted ? loginSuccess("test-token") : response(401, "invalid credentials");
    }
    return response(200, content, { "Content-Length": String(Buffer.byteLength(content)) });
  });
}

function prompter(...answers: Array<{ username: string; password: string }>) {
  const queue = [...answers];
  const promptCredential = vi.fn<CredentialPrompter["promptCredential"]>(async (url: string) => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected prompt");
    return { url, ...next };
  });
  return { promptCredential };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("acquireToken", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("logs in with stored credentials", async () => {
    const store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "test-secret" });
    const ask = prompter();
    const fetchImpl = armory();

    const token = await acquireToken(REPO, {
      fetchImpl,
      store,
      prompter: ask,
      logger: createNoopLogger(),
      interactive: true,
    });

    expect(token).toBe("test-token");
    expect(ask.promptCredential).not.toHaveBeenCalled();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("prompts for and saves missing credentials", async () => {
    const store = new MemoryStore();
    const ask = prompter({ username: "alice", password: "test-secret" });

    const token = await acquireToken(REPO, {
      fetchImpl: armory(),
      store,
      prompter: ask,
      logger: createNoopLogger(),
      interactive: true,
    });

    expect(token).toBe("test-token");
    expect(store.entries).toEqual([{ url: REPO, username: "alice", password: "test-secret" }]);
  });

  it("fails without prompting when input is disabled", async () => {
    const ask = prompter();

    await expect(
      acquireToken(REPO, {
        fetchImpl: armory(),
        store: new MemoryStore(),
        prompter: ask,
        logger: createNoopLogger(),
        interactive: false,
      })
    ).rejects.toMatchObject({ code: "CONFIG_NOT_FOUND" });
    expect(ask.promptCredential).not.toHaveBeenCalled();
  });

  it("asks again once when stored credentials are rejected", async () => {
    const store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "stale" });
    const ask = prompter({ username: "alice", password: "test-secret" });
    const fetchImpl = armory();

    const token = await acquireToken(REPO, {
      fetchImpl,
      store,
      prompter: ask,
      logger: createNoopLogger(),
      interactive: true,
    });

    expect(token).toBe("test-token");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(store.load(REPO).password).toBe("test-secret");
  });

  it("gives up after the second rejection", async () => {
    const store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "stale" });
    const ask = prompter({ username: "alice", password: "still-wrong" });

    await expect(
      acquireToken(REPO, {
        fetchImpl: armory(),
        store,
        prompter: ask,
        logger: createNoopLogger(),
        interactive: true,
      })
    ).rejects.toMatchObject({
      code: "AUTH_REJECTED_CREDENTIALS",
      message: "Login failed with status 401: invalid credentials",
    });
    expect(ask.promptCredential).toHaveBeenCalledTimes(1);
  });

  it("surfaces rejected credentials when input is disabled", async () => {
    const store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "stale" });

    await expect(
      acquireToken(REPO, {
        fetchImpl: armory(),
        store,
        prompter: prompter(),
        logger: createNoopLogger(),
        interactive: false,
      })
    ).rejects.toMatchObject({ code: "AUTH_REJECTED_CREDENTIALS" });
  });
});

describe("runDownload", () => {
  let cwd: string;
  let store: MemoryStore;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "armory-run-"));
    store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "test-secret" });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  function deps(fetchImpl: FetchFn) {
    return {
      fetchImpl,
      store,
      prompter: prompter(),
      progress: new SilentProgress(),
      logger: createNoopLogger(),
      interactive: false,
      cwd,
    };
  }

  it("logs in and sends the token as a cookie", async () => {
    const fetchImpl = armory();

    const result = await runDownload(FILE_URL, {}, deps(fetchImpl));

    expect(fetchImpl.mock.calls[1]).toEqual([
      FILE_URL,
      { method: "GET", headers: { Cookie: "USER_TOKEN=test-token" } },
    ]);
    expect(result).toEqual({
      filename: "tool-1.0.tar.gz",
      path: join(cwd, "tool-1.0.tar.gz"),
      bytesWritten: 14,
      resumedFrom: 0,
      totalSize: 14,
    });
    expect(readFileSync(join(cwd, "tool-1.0.tar.gz"), "utf-8")).toBe("artifact-bytes");
  });

  it("saves into --dir under --output", async () => {
    await runDownload(FILE_URL, { dir: "out/nested", output: "custom.bin" }, deps(armory()));

    expect(readFileSync(join(cwd, "out", "nested", "custom.bin"), "utf-8")).toBe("artifact-bytes");
    expect(existsSync(join(cwd, "out", "nested", "custom.bin.part"))).toBe(false);
  });

  it("downloads other hosts anonymously", async () => {
    const fetchImpl = armory("public");

    await runDownload("https://cdn.example.org/pkg/readme.txt", {}, deps(fetchImpl));

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith("https://cdn.example.org/pkg/readme.txt", {
      method: "GET",
      headers: {},
    });
    expect(readFileSync(join(cwd, "readme.txt"), "utf-8")).toBe("public");
  });

  it("logs in to the --repo repository", async () => {
    const fetchImpl = armory("mirrored");

    await runDownload("https://cdn.example.org/readme.txt", { repo: `${REPO}/ui/home` }, deps(fetchImpl));

    expect(fetchImpl.mock.calls[0][0]).toBe(`${REPO}${LOGIN_PATH}`);
    expect(fetchImpl.mock.calls[1][1]).toEqual({
      method: "GET",
      headers: { Cookie: "USER_TOKEN=test-token" },
    });
  });

  it("rejects an invalid URL before any request", async () => {
    const fetchImpl = armory();

    await expect(runDownload("not a url", {}, deps(fetchImpl))).rejects.toMatchObject({
      code: "VALIDATION_INVALID_URL",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("does not download when login fails", async () => {
    store.save({ url: REPO, username: "alice", password: "stale" });
    const fetchImpl = armory();

    await expect(runDownload(FILE_URL, {}, deps(fetchImpl))).rejects.toMatchObject({
      code: "AUTH_REJECTED_CREDENTIALS",
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(existsSync(join(cwd, "tool-1.0.tar.gz.part"))).toBe(false);
  });
});

describe("download command", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "armory-cmd-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    resetContext();
  });

  it("prints a JSON envelope in JSON mode", async () => {
    const consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const store = new MemoryStore();
    store.save({ url: REPO, username: "alice", password: "test-secret" });
    initContext(["node", "armory-dl", "--json"], {});

    const program = new Command().exitOverride().option("--json");
    registerDownloadCommand(program, {
      fetchImpl: armory(),
      store,
      prompter: prompter(),
      progress: new SilentProgress(),
      logger: createNoopLogger(),
      interactive: false,
      cwd,
    });
    await program.parseAsync(["node", "armory-dl", "--json", FILE_URL]);

    const printed = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(printed.success).toBe(true);
    expect(printed.data).toEqual({
      filename: "tool-1.0.tar.gz",
      path: join(cwd, "tool-1.0.tar.gz"),
      bytesWritten: 14,
      resumedFrom: 0,
      totalSize: 14,
    });
  });
});
