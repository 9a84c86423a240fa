import type { Logger } from 'pino';
import { createOtaUpdater } from '@devicefleet/ota-client';
import type { UpdateOrchestrator } from '@devicefleet/ota-client';
import type { AgentConfig } from './config';
import { createProcessRestart } from './restart';

export const AGENT_USER_AGENT = 'ota-agent/0.1.0';

export type AgentUpdater = Pick<UpdateOrchestrator, 'isUpdateAvailable' | 'downloadAndApplyUpdate'>;

export function createAgentUpdater(config: AgentConfig, logger: Logger): AgentUpdater {
  const orchestrator = createOtaUpdater({
    backendUrl: config.backendUrl,
    deviceToken: config.deviceToken,
    request: {
      attempts: config.retryAttempts,
      delayMs: config.retryDelayMs,
      timeoutMs: config.httpTimeoutMs,
      userAgent: AGENT_USER_AGENT
    },
    repository: config.repository,
    orchestrator: {
      restart: createProcessRestart(logger, config.restartExitCode),
      keepFiles: config.keepFiles,
      keepDirectories: config.keepDirectories
    },
    logger
  });
  orchestrator.onStateChange((state, previous) => {
    logger.debug({ state, previous }, 'Update state changed');
  });
  return orchestrator;
}
