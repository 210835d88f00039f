export interface ProcessSupervisorPort {
  /** Starts a detached child and returns its pid. */
  spawnDetached(args: string[], logFile: string): Promise<number>;
  isAlive(pid: number): boolean;
  terminate(pid: number): boolean;
}
