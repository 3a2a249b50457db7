export type { FetchFn, HttpHeaders, HttpRequestInit, HttpResponse } from "./http.js";
export type { CredentialPrompter } from "./prompt.js";
export type { ProgressReporter } from "./progress.js";
