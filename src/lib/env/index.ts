export { EnvError, parseEnv, type Env } from "./env";
export { nodeEnvSchema, type NodeEnv } from "./schema";
