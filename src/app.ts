#!/usr/bin/env node
import { serve } from '@hono/node-server';

import { loadDaemonConfig } from './shared/config/env.js';
import { createLogger } from './shared/logging/logger.js';

// Domain - Policy
import { FileSystemPolicyRepository, PolicyService, PolicyStore } from './domains/policy/index.js';

// Domain - Lock
import {
  CommandSecretPrompt,
  LockCoordinator,
  PasswordVerifier,
  SignalProcessActuator,
  defaultPromptCommand,
} from './domains/lock/index.js';

// Infrastructure
import { ProcessWatcher } from './infrastructure/process/process-watcher.js';
import { PsProcessLister } from './infrastructure/process/ps-process-lister.js';

import { createApi } from './api.js';

const log = createLogger('app');

// Config
const config = loadDaemonConfig(process.argv.slice(2), process.env);

// Policy
const policyRepository = new FileSystemPolicyRepository(config.configPath);
const policyStore = new PolicyStore();
const policyService = new PolicyService(policyRepository, policyStore);

// Lock
const promptCommand = config.promptCommand ?? defaultPromptCommand(process.platform);
const verifier = new PasswordVerifier(
  new CommandSecretPrompt(promptCommand.command, promptCommand.args),
  () => policyService.getPasswordHash()
);
const coordinator = new LockCoordinator({
  policyStore,
  actuator: new SignalProcessActuator(),
  verifier,
});

// Notification source
const watcher = new ProcessWatcher({
  lister: new PsProcessLister(),
  onEvent: (event) => {
    coordinator.onEvent(event);
  },
  recheck: (name) => policyStore.match(name) !== null,
});
policyStore.onReload(() => watcher.setInterval(policyService.checkIntervalMs()));

const app = createApi({
  policyService,
  coordinator,
  apiKeys: config.apiKeys,
  watcherStatus: () => watcher.getStatus(),
});

async function main() {
  const loaded = await policyService.reload();
  if (loaded.ok && loaded.policy.keywords.length === 0) {
    log.warn({ configPath: config.configPath }, 'no apps are locked; add some with POST /api/policy/apps');
  }
  if (policyService.getPasswordHash() === null) {
    log.warn('no unlock password is set; every locked app will be closed until one is set');
  }

  watcher.start();

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host });
  log.info({ host: config.host, port: config.port, configPath: config.configPath }, 'applock running');

  // Reload policy from disk
  process.on('SIGHUP', () => {
    log.info('SIGHUP received, reloading config');
    void policyService.reload();
  });

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'shutting down');
    watcher.stop();
    await coordinator.shutdown();
    server.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  log.fatal({ err }, 'failed to start');
  process.exit(1);
});
