export { ClaudeProvider } from "./ClaudeProvider.js";
export { callClaude, type ClaudeApiParams } from "./claude-api.js";
