import type { Logger } from 'pino';
import type { RestartFunction } from '@devicefleet/ota-client';

export type ExitFunction = (code: number) => void;

/**
 * The device restart primitive: the agent exits and its process supervisor starts it again
 * from the freshly swapped firmware tree.
 */
export function createProcessRestart(
  logger: Logger,
  exitCode: number,
  exit: ExitFunction = (code) => process.exit(code)
): RestartFunction {
  return () => {
    logger.info({ exitCode }, 'Initiating device restart');
    logger.flush();
    exit(exitCode);
  };
}
