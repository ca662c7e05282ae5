export type { ITextGenerator } from "./text-generator.interface.js";
export { OpenAICompatibleGenerator } from "./openai-generator.js";
export type { OpenAIGeneratorConfig } from "./openai-generator.js";
export { createTextGenerator } from "./factory.js";
