export interface ProcessSample {
  pid: number;
  name: string;
}

/** Reads the host's process table. */
export interface ProcessLister {
  list(): Promise<ProcessSample[]>;
  /** Process owning the focused window, where the platform can tell */
  foreground?(): Promise<ProcessSample | undefined>;
}

export interface ProcessWatcherStatus {
  running: boolean;
  intervalMs: number;
  tracked: number;
  lastTickAt?: number;
  lastError?: string;
}
