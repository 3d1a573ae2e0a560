import { ITransport } from '@netform/contracts';
import { createLogger, Logger } from '@netform/logger';
import { Orchestrator } from '@netform/orchestrator';
import { RouterOSProvider } from '@netform/provider-routeros';
import { StateManager } from '@netform/state';
import { MemoryTransport, RestTransport } from '@netform/transport';
import fs from 'node:fs/promises';

import { AppConfig, loadConfig } from './config';

export const CONFIG_FILE = 'netform.json';

/** The orchestrator operations the commands use */
export type CommandOrchestrator = Pick<Orchestrator, 'plan' | 'apply' | 'destroy' | 'planDestroy' | 'validate'>;

export function createTransport(config: AppConfig, logger: Logger): ITransport {
  if (config.transport === 'memory') return new MemoryTransport();
  if (!config.url) throw new Error('NETFORM_URL is required for the rest transport');

  return new RestTransport({
    baseUrl: config.url,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    readRetries: config.readRetries,
    readRetryBackoffMs: config.readRetryBackoffMs,
    logger,
  });
}

export function createOrchestrator(cwd: string, config: AppConfig = loadConfig()): CommandOrchestrator {
  const logger = createLogger(config.logLevel);
  const orchestrator = new Orchestrator(new StateManager(cwd), { logger });
  orchestrator.registerProvider(new RouterOSProvider(createTransport(config, logger), { logger }));
  return orchestrator;
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(
    () => true,
    () => false
  );
}
