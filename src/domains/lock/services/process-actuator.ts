// Process actuator interface - how the coordinator acts on a target process

export type ActuatorResult = { ok: true } | { ok: false; error: string };

export interface ProcessActuator {
  /** Freeze or hide the process before any prompt is shown. */
  suspend(processId: number): Promise<ActuatorResult>;

  /** Undo suspend and bring the app back to the user. */
  restore(processId: number): Promise<ActuatorResult>;

  /** Kill the process. */
  terminate(processId: number): Promise<ActuatorResult>;

  /** Start the app again by name, for when the original process is gone. */
  relaunch(displayName: string): Promise<ActuatorResult>;

  /** Whether the process still exists (a suspended process counts as alive). */
  isAlive(processId: number): boolean;
}
