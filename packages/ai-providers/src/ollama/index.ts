export { OllamaProvider } from "./OllamaProvider.js";
