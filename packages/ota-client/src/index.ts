import type { Logger } from 'pino';
import { AttributeClient } from './attributes';
import { silentLogger } from './logger';
import { UpdateOrchestrator } from './orchestrator';
import { RepositorySource } from './repository';
import { RequestExecutor } from './requestExecutor';
import type {
  OrchestratorOptions,
  RepositorySourceOptions,
  RequestExecutorOptions
} from './types';

export * from './attributes';
export * from './errors';
export * from './fsTree';
export * from './hash';
export * from './orchestrator';
export * from './repository';
export * from './requestExecutor';
export * from './types';

export interface OtaUpdaterOptions {
  backendUrl: string;
  deviceToken: string;
  request?: Omit<RequestExecutorOptions, 'logger'>;
  repository?: Omit<RepositorySourceOptions, 'logger'>;
  orchestrator: Omit<OrchestratorOptions, 'logger'>;
  logger?: Logger;
}

/**
 * Wires one request executor into both protocol clients and hands them to an orchestrator.
 */
export function createOtaUpdater(options: OtaUpdaterOptions): UpdateOrchestrator {
  const logger = options.logger ?? silentLogger;
  const executor = new RequestExecutor({ ...options.request, logger: logger.child({ component: 'http' }) });
  const backend = new AttributeClient(executor, {
    baseUrl: options.backendUrl,
    deviceToken: options.deviceToken,
    logger: logger.child({ component: 'attributes' })
  });
  const source = new RepositorySource(executor, {
    ...options.repository,
    logger: logger.child({ component: 'repository' })
  });
  return new UpdateOrchestrator(backend, source, {
    ...options.orchestrator,
    logger: logger.child({ component: 'orchestrator' })
  });
}
