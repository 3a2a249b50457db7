import { z } from "zod";
import { nodeFetch } from "./adapters/node-fetch-http.js";
import { normalizeRepoKey } from "./credential-store.js";
import { authTransportFailure, malformedLoginResponse, rejectedCredentials } from "./errors/catalog.js";
import { describeCause } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { FetchFn, HttpResponse } from "./ports/http.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOGIN_PATH = "/usercenter/v1/auth/login";

export const LoginResponseSchema = z.object({
  status: z.number(),
  message: z.string(),
  field_errors: z.unknown().optional(),
  data: z.object({
    id: z.number(),
    username: z.string(),
    jti: z.string(),
    accessToken: z.string(),
    refreshToken: z.string(),
  }),
});

export type LoginResponse = z.infer<typeof LoginResponseSchema>;

export interface AuthDeps {
  fetchImpl?: FetchFn;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Exchange a username and password for a short-lived access token.
 * Makes a single attempt; re-prompting is up to the caller.
 */
export async function login(
  baseUrl: string,
  username: string,
  password: string,
  deps: AuthDeps = {}
): Promise<string> {
  const { fetchImpl = nodeFetch, logger = createNoopLogger() } = deps;
  const repo = normalizeRepoKey(baseUrl);
  const loginUrl = `${repo}${LOGIN_PATH}`;

  logger.debug("Attempting login", { url: loginUrl, username });

  let response: HttpResponse;
  let text: string;
  try {
    response = await fetchImpl(loginUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ account: username, password }),
    });
    text = await response.text();
  } catch (err) {
    throw authTransportFailure(loginUrl, err);
  }

  if (!response.ok) {
    throw rejectedCredentials(response.status, text, repo);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw malformedLoginResponse(`Failed to parse login response: ${describeCause(err)}`, text);
  }

  const result = LoginResponseSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw malformedLoginResponse(`Login response is missing expected fields: ${fields}`, text);
  }

  if (result.data.data.accessToken === "") {
    throw malformedLoginResponse("Server returned an empty access token", text);
  }

  logger.info("Obtained access token", { url: repo, username: result.data.data.username });
  return result.data.data.accessToken;
}
