import path from 'node:path';
import { Command } from 'commander';
import type { Logger } from 'pino';
import type { UpdateOutcome } from '@devicefleet/ota-client';
import { loadConfig } from './config';
import type { AgentConfig } from './config';
import { createLogger } from './logger';
import { runPoller } from './poller';
import { createAgentUpdater } from './updater';
import type { AgentUpdater } from './updater';

type GlobalOptions = {
  dir?: string;
  json?: boolean;
};

type AgentContext = {
  config: AgentConfig;
  logger: Logger;
  updater: AgentUpdater;
  firmwareDir: string;
};

type CliDependencies = {
  configLoader?: () => AgentConfig;
  loggerFactory?: (config: AgentConfig) => Logger;
  updaterFactory?: (config: AgentConfig, logger: Logger) => AgentUpdater;
};

function formatOutput(payload: unknown, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  console.log(payload);
}

function describeOutcome(outcome: UpdateOutcome): string {
  if (outcome.status === 'up-to-date') {
    return 'Firmware is up to date';
  }
  return `Updated to ${outcome.firmware.title}@${outcome.firmware.version} (${outcome.files} files)`;
}

async function handleCheck(context: AgentContext, options: GlobalOptions): Promise<void> {
  const updateAvailable = await context.updater.isUpdateAvailable();
  if (options.json) {
    formatOutput({ updateAvailable }, true);
    return;
  }
  formatOutput(updateAvailable ? 'New firmware available' : 'Firmware is up to date', false);
}

async function handleApply(context: AgentContext, options: GlobalOptions): Promise<void> {
  const outcome = await context.updater.downloadAndApplyUpdate(context.firmwareDir);
  formatOutput(options.json ? outcome : describeOutcome(outcome), options.json);
}

async function handleRun(context: AgentContext): Promise<void> {
  const controller = new AbortController();
  const stop = () => {
    context.logger.info('Stop requested');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await runPoller({
      updater: context.updater,
      firmwareDir: context.firmwareDir,
      intervalMs: context.config.pollIntervalMs,
      logger: context.logger,
      signal: controller.signal
    });
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

export function createInterface(deps: CliDependencies = {}): Command {
  const configLoader = deps.configLoader ?? (() => loadConfig());
  const loggerFactory = deps.loggerFactory ?? ((config: AgentConfig) => createLogger(config.logLevel));
  const updaterFactory = deps.updaterFactory ?? createAgentUpdater;

  const program = new Command();
  program
    .name('ota-agent')
    .description('Device-side firmware over-the-air update agent')
    .option('--dir <path>', 'Firmware directory to update (defaults to OTA_FIRMWARE_DIR or the working directory)')
    .option('--json', 'Output raw JSON');

  const resolveContext = (): AgentContext => {
    const options = program.opts<GlobalOptions>();
    const config = configLoader();
    const logger = loggerFactory(config);
    return {
      config,
      logger,
      updater: updaterFactory(config, logger),
      firmwareDir: options.dir ? path.resolve(options.dir) : config.firmwareDir
    };
  };

  program
    .command('check')
    .description('Check whether the backend publishes newer firmware')
    .action(async () => {
      await handleCheck(resolveContext(), program.opts<GlobalOptions>());
    });

  program
    .command('apply')
    .description('Download, verify and install the published firmware once')
    .action(async () => {
      await handleApply(resolveContext(), program.opts<GlobalOptions>());
    });

  program
    .command('run')
    .description('Poll the backend and apply new firmware until interrupted')
    .action(async () => {
      await handleRun(resolveContext());
    });

  return program;
}
