export { envSchema, parseEnv, DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL } from "./env.js";
