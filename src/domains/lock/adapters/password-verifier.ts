import type { CredentialVerifier, VerifyOutcome, VerifyRequest } from '../services/credential-verifier.js';
import type { PromptResult, SecretPrompt } from './secret-prompt.js';
import { passwordMatches } from '../../../shared/utils/password-hash.js';
import { errorMessage } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('password-verifier');

export function promptMessage(request: VerifyRequest): string {
  const attempts = request.remainingAttempts === 1 ? '1 attempt' : `${request.remainingAttempts} attempts`;
  return `${request.prompt} is locked. Enter your password to unlock it (${attempts} left).`;
}

/**
 * Checks a typed password against the configured SHA-256 hash.
 */
export class PasswordVerifier implements CredentialVerifier {
  constructor(
    private readonly prompt: SecretPrompt,
    private readonly passwordHash: () => string | null
  ) {}

  async verify(request: VerifyRequest): Promise<VerifyOutcome> {
    const hash = this.passwordHash();
    if (hash === null) {
      return { kind: 'failure', reason: 'unavailable', message: 'no unlock password is set' };
    }

    let result: PromptResult;
    try {
      result = await this.prompt.ask({
        title: `Unlock ${request.prompt}`,
        message: promptMessage(request),
        signal: request.signal,
      });
    } catch (err) {
      if (request.signal.aborted) return { kind: 'cancelled' };
      log.error({ err, appKey: request.appKey }, 'password prompt failed');
      return { kind: 'failure', reason: 'unavailable', message: errorMessage(err) };
    }

    if (result.kind === 'dismissed') return { kind: 'cancelled' };

    if (passwordMatches(result.secret, hash)) return { kind: 'success' };

    log.info({ appKey: request.appKey, attempt: request.attempt }, 'wrong password');
    return { kind: 'failure', reason: 'wrong_credential' };
  }
}
