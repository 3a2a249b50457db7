export { interactivePrompts } from "./interactive-prompts.js";
export { nodeFetch } from "./node-fetch-http.js";
