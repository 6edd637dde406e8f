export { EnvSchema, createConfig, parseEnv, type AppConfig, type Env } from './env.js';
