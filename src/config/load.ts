import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  if (env === process.env) {
    dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });
  }
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Config validation failed: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
};
