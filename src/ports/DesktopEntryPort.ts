export interface DesktopEntryPort {
  /** Path of the generated launcher, or null when none could be written. */
  create(options: { lightIcon: boolean }): string | null;
}
