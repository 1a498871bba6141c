export { LockCoordinator, type LockCoordinatorOptions } from './services/lock-coordinator.js';
export { GraceTracker } from './services/grace-tracker.js';
export type { ProcessActuator, ActuatorResult } from './services/process-actuator.js';
export type { CredentialVerifier, VerifyOutcome, VerifyRequest } from './services/credential-verifier.js';
export { SignalProcessActuator } from './adapters/signal-process-actuator.js';
export { PasswordVerifier } from './adapters/password-verifier.js';
export { CommandSecretPrompt, defaultPromptCommand, parseCommandLine } from './adapters/command-secret-prompt.js';
export type { SecretPrompt, PromptResult } from './adapters/secret-prompt.js';
export { createLockRoutes } from './api/routes.js';
export type { ProcessEvent, LockDecision, LockState } from './models/lock.js';
