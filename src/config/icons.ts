import path from 'node:path';
import type { EnvironmentConfig } from '@/config/environment';

export interface IconAssets {
  defaultIcon: string;
  lightIcon: string;
}

export function buildIconAssets(env: Pick<EnvironmentConfig, 'assetsDir'>): IconAssets {
  return {
    defaultIcon: path.join(env.assetsDir, 'icon.svg'),
    lightIcon: path.join(env.assetsDir, 'icon-light.svg'),
  };
}
