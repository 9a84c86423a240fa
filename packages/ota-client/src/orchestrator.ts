import path from 'node:path';
import type { Logger } from 'pino';
import { describeFirmware, isFirmwareDifferent } from './attributes';
import type { AttributeClient } from './attributes';
import { HashMismatchError, UpdateInProgressError } from './errors';
import { mergeDirectory, removeTree, resetDirectory, topLevelName, wipeDirectory, writeStagedFile } from './fsTree';
import { computeBlobDigest, verifyBlobDigest } from './hash';
import { silentLogger } from './logger';
import type { RepositorySource } from './repository';
import type {
  FirmwareDescriptor,
  OrchestratorOptions,
  OrchestratorState,
  RestartFunction,
  UpdateOutcome,
  UpdateStatus
} from './types';

export const STAGING_DIR_NAME = 'temp-firmware';
export const DEFAULT_KEEP_FILES: readonly string[] = ['boot.py', 'main.py', 'code.py', 'settings.toml'];
export const DEFAULT_KEEP_DIRECTORIES: readonly string[] = ['lib'];

export type FirmwareBackend = Pick<
  AttributeClient,
  | 'fetchDesiredFirmware'
  | 'fetchCurrentFirmware'
  | 'isUpdateAvailable'
  | 'reportStatus'
  | 'reportFailure'
  | 'publishCurrentFirmware'
>;

export type FirmwareSource = Pick<RepositorySource, 'openFirmware'>;

export type StateChangeListener = (state: OrchestratorState, previous: OrchestratorState) => void;

const PRE_SWAP_CHECKPOINTS: readonly UpdateStatus[] = ['VERIFIED', 'DOWNLOADED', 'UPDATING'];

/**
 * Runs one firmware update attempt end to end: download, verify, stage, swap, report
 * and restart. The staging directory lives inside the target directory and is removed
 * on every exit path.
 */
export class UpdateOrchestrator {
  private readonly backend: FirmwareBackend;
  private readonly source: FirmwareSource;
  private readonly restart: RestartFunction;
  private readonly stagingDirName: string;
  private readonly keepFiles: readonly string[];
  private readonly keepDirectories: readonly string[];
  private readonly logger: Logger;
  private readonly listeners = new Set<StateChangeListener>();
  private currentState: OrchestratorState = 'Idle';
  private running = false;

  constructor(backend: FirmwareBackend, source: FirmwareSource, options: OrchestratorOptions) {
    this.backend = backend;
    this.source = source;
    this.restart = options.restart;
    this.stagingDirName = options.stagingDirName ?? STAGING_DIR_NAME;
    this.keepFiles = options.keepFiles ?? DEFAULT_KEEP_FILES;
    this.keepDirectories = options.keepDirectories ?? DEFAULT_KEEP_DIRECTORIES;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async isUpdateAvailable(): Promise<boolean> {
    return this.backend.isUpdateAvailable();
  }

  /**
   * Resolves with `up-to-date` when nothing is published or the published firmware is
   * already running. After a successful swap the restart primitive is invoked; in
   * production it does not return.
   */
  async downloadAndApplyUpdate(targetDirectory: string = process.cwd()): Promise<UpdateOutcome> {
    if (this.running) {
      throw new UpdateInProgressError();
    }
    this.running = true;
    const root = path.resolve(targetDirectory);
    const stagingDir = path.join(root, this.stagingDirName);

    try {
      const outcome = await this.attemptUpdate(root, stagingDir);
      if (outcome.status === 'updated') {
        this.logger.info('Initiating device restart');
        await this.restart();
      }
      return outcome;
    } finally {
      this.running = false;
      this.transition('Idle');
    }
  }

  private async attemptUpdate(root: string, stagingDir: string): Promise<UpdateOutcome> {
    try {
      return await this.applyUpdate(root, stagingDir);
    } catch (err) {
      this.transition('Failed');
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err }, message);
      await this.reportFailureSafely(err);
      throw err;
    } finally {
      await this.releaseStaging(stagingDir);
    }
  }

  private async applyUpdate(root: string, stagingDir: string): Promise<UpdateOutcome> {
    const desired = await this.backend.fetchDesiredFirmware();
    this.logger.info({ firmware: desired }, 'Remote firmware info');
    const current = await this.backend.fetchCurrentFirmware();
    this.logger.info({ firmware: current }, 'Current firmware info');

    if (!desired || !isFirmwareDifferent(desired, current)) {
      return { status: 'up-to-date' };
    }

    await resetDirectory(stagingDir);
    this.transition('Downloading');
    await this.backend.reportStatus(current, 'DOWNLOADING');
    this.logger.info({ url: desired.sourceUrl }, 'Downloading firmware');

    const files = await this.stageFirmware(desired, stagingDir);
    this.logger.info({ stagingDir, files }, 'Firmware downloaded');

    this.transition('Downloaded');
    this.transition('Verified');
    for (const checkpoint of PRE_SWAP_CHECKPOINTS) {
      await this.backend.reportStatus(current, checkpoint);
    }
    this.transition('Updating');

    this.logger.info(`Updating firmware to ${describeFirmware(desired)}`);
    await this.swap(root, stagingDir);
    await this.backend.publishCurrentFirmware(desired);
    this.transition('Updated');
    await this.backend.reportStatus(current, 'UPDATED');
    this.logger.info('Firmware updated successfully');

    return { status: 'updated', firmware: desired, files };
  }

  private async stageFirmware(desired: FirmwareDescriptor, stagingDir: string): Promise<number> {
    let staged = 0;
    for await (const file of await this.source.openFirmware(desired.sourceUrl)) {
      this.transition('Verifying');
      if (!verifyBlobDigest(file.bytes, file.contentDigest)) {
        throw new HashMismatchError(file.path, computeBlobDigest(file.bytes), file.contentDigest);
      }
      const topLevel = topLevelName(file.path);
      if (topLevel !== this.stagingDirName && this.isKept(topLevel)) {
        this.logger.warn({ path: file.path }, `Skipping ${file.path}: ${topLevel} is preserved on the device`);
        this.transition('Downloading');
        continue;
      }
      const destination = await writeStagedFile(stagingDir, file.path, file.bytes, [this.stagingDirName]);
      this.logger.info({ destination }, `Saving firmware to: ${destination}`);
      staged += 1;
      this.transition('Downloading');
    }
    return staged;
  }

  private isKept(name: string): boolean {
    return this.keepFiles.includes(name) || this.keepDirectories.includes(name);
  }

  private async swap(root: string, stagingDir: string): Promise<void> {
    const removed = await wipeDirectory(root, {
      keepFiles: this.keepFiles,
      keepDirectories: [...this.keepDirectories, this.stagingDirName]
    });
    this.logger.debug({ removed }, 'Removed previous firmware entries');
    const moved = await mergeDirectory(stagingDir, root);
    this.logger.debug({ moved }, 'Moved staged firmware into place');
  }

  private async reportFailureSafely(error: unknown): Promise<void> {
    try {
      await this.backend.reportFailure(error);
    } catch (reportError) {
      this.logger.error({ err: reportError }, 'Failed to report firmware update failure');
    }
  }

  private async releaseStaging(stagingDir: string): Promise<void> {
    try {
      await removeTree(stagingDir);
    } catch (err) {
      this.logger.error({ err, stagingDir }, 'Failed to remove staging directory');
    }
  }

  private transition(next: OrchestratorState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
