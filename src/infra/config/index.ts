export {
  parseEnv,
  createConfig,
  EnvSchema,
  DEFAULT_CODE_CATALOGUE_PATH,
  type Env,
  type AppConfig,
} from './env.js';
