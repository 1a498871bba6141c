// Secret prompt interface - the dialog that collects a password

export type PromptResult = { kind: 'entered'; secret: string } | { kind: 'dismissed' };

export interface SecretPromptRequest {
  title: string;
  message: string;
  signal: AbortSignal;
}

export interface SecretPrompt {
  /**
   * Show the prompt and wait for the user.
   * Rejects when the prompt cannot be shown or the signal aborts it.
   */
  ask(request: SecretPromptRequest): Promise<PromptResult>;
}
