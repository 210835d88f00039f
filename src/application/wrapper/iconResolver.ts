import path from 'node:path';
import { NO_DESKTOP_FILE } from '@/domain/mpris/types';
import type { IconAssets } from '@/config/icons';
import type { DesktopEntryPort } from '@/ports/DesktopEntryPort';
import type { StatusAccessor } from '@/application/wrapper/statusAccessor';

type CachedEntry = { lightIcon: boolean; entry: string };

export class IconResolver {
  private lightIcon = false;
  private desktopEntry: CachedEntry | null = null;

  constructor(
    private readonly status: StatusAccessor,
    private readonly assets: IconAssets,
    private readonly desktopEntries: DesktopEntryPort,
  ) {}

  public setIcon(light: boolean): void {
    if (light !== this.lightIcon) {
      this.desktopEntry = null;
    }
    this.lightIcon = light;
  }

  /**
   * Media artwork, then the receiver app's icon, then a bundled icon.
   */
  public getArtUrl(): string {
    const thumbnail = this.status.mediaController.thumbnail;
    if (thumbnail) {
      return thumbnail;
    }
    const icon = this.status.castStatus?.iconUrl;
    if (icon) {
      return icon;
    }
    return this.lightIcon ? this.assets.lightIcon : this.assets.defaultIcon;
  }

  /**
   * MPRIS wants the launcher's name without its `.desktop` suffix.
   */
  public getDesktopEntry(): string {
    if (this.desktopEntry && this.desktopEntry.lightIcon === this.lightIcon) {
      return this.desktopEntry.entry;
    }
    const created = this.desktopEntries.create({ lightIcon: this.lightIcon });
    const entry = created ? stripExtension(created) : NO_DESKTOP_FILE;
    this.desktopEntry = { lightIcon: this.lightIcon, entry };
    return entry;
  }
}

export function stripExtension(filePath: string): string {
  const ext = path.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}
