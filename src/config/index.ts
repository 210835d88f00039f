import { loadEnvironment } from '@/config/environment';
import { buildIconAssets } from '@/config/icons';
import { buildSessionPaths } from '@/config/session';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const environment = loadEnvironment(env);
  return {
    env: environment,
    icons: buildIconAssets(environment),
    session: buildSessionPaths(environment),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
