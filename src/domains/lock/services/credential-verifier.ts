// Credential verifier interface - collects and checks a secret for one prompt

export type VerifyFailureReason =
  /** the secret was checked and did not match; the coordinator may re-prompt */
  | 'wrong_credential'
  /** no backend or no credential configured */
  | 'unavailable'
  | 'error';

export type VerifyOutcome =
  | { kind: 'success' }
  | { kind: 'failure'; reason: VerifyFailureReason; message?: string }
  | { kind: 'cancelled' };

export interface VerifyRequest {
  /** Human-readable label, the display name of the intercepted process */
  prompt: string;
  appKey: string;
  processId: number;
  attempt: number;
  maxAttempts: number;
  remainingAttempts: number;
  /** Aborted when the coordinator stops waiting (deadline, shutdown, process gone) */
  signal: AbortSignal;
}

export interface CredentialVerifier {
  verify(request: VerifyRequest): Promise<VerifyOutcome>;
}
