export { parseEnv, envSchema } from "./env.js";
