import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync } from '@/shared/bestEffort';
import { APP_NAME, DEFAULT_NAME } from '@/config/environment';
import type { IconAssets } from '@/config/icons';
import type { DesktopEntryPort } from '@/ports/DesktopEntryPort';

export function renderDesktopEntry(icon: string): string {
  return [
    '[Desktop Entry]',
    'Type=Application',
    `Name=${DEFAULT_NAME}`,
    `Icon=${icon}`,
    'Exec=cast-bridge connect',
    'Terminal=false',
    'NoDisplay=true',
    'Categories=AudioVideo;Player;',
    '',
  ].join('\n');
}

/**
 * Writes `<applications dir>/cast_bridge.desktop` pointing at the chosen icon.
 * A directory that cannot be written yields no entry.
 */
export class DesktopEntryWriter implements DesktopEntryPort {
  private readonly log = createLogger('Desktop', 'Entry');

  constructor(
    private readonly applicationsDir: string,
    private readonly icons: IconAssets,
  ) {}

  public get entryPath(): string {
    return path.join(this.applicationsDir, `${APP_NAME}.desktop`);
  }

  public create(options: { lightIcon: boolean }): string | null {
    const icon = options.lightIcon ? this.icons.lightIcon : this.icons.defaultIcon;
    const target = this.entryPath;
    return bestEffortSync<string | null>(
      () => {
        mkdirSync(this.applicationsDir, { recursive: true });
        writeFileSync(target, renderDesktopEntry(icon), 'utf-8');
        this.log.debug('desktop entry written', { path: target, icon });
        return target;
      },
      {
        fallback: null,
        onError: 'warn',
        log: this.log,
        label: 'desktop entry not written',
        context: { path: target },
      },
    );
  }
}
