import type { Logger } from 'pino';

export const UPDATE_STATUSES = [
  'DOWNLOADING',
  'DOWNLOADED',
  'VERIFIED',
  'UPDATING',
  'UPDATED',
  'FAILED'
] as const;

export type UpdateStatus = (typeof UPDATE_STATUSES)[number];

export type OrchestratorState =
  | 'Idle'
  | 'Downloading'
  | 'Verifying'
  | 'Downloaded'
  | 'Verified'
  | 'Updating'
  | 'Updated'
  | 'Failed';

export interface FirmwareDescriptor {
  title: string;
  version: string;
  sourceUrl: string;
}

export interface RemoteFile {
  /** Repository-relative path using forward slashes. */
  path: string;
  contentDigest: string;
}

export interface DownloadedFile extends RemoteFile {
  bytes: Buffer;
}

export interface RepositoryLocation {
  owner: string;
  repo: string;
  accessToken: string | null;
}

export type SleepFunction = (ms: number) => Promise<unknown>;

export interface RequestExecutorOptions {
  attempts?: number;
  delayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  sleep?: SleepFunction;
  logger?: Logger;
}

export interface AttributeClientOptions {
  /** Backend origin, e.g. `https://fleet.example.com:8080`. */
  baseUrl: string;
  deviceToken: string;
  logger?: Logger;
}

export interface RepositorySourceOptions {
  apiBaseUrl?: string;
  rawBaseUrl?: string;
  branch?: string;
  logger?: Logger;
}

export type RestartFunction = () => void | Promise<void>;

export interface OrchestratorOptions {
  restart: RestartFunction;
  stagingDirName?: string;
  keepFiles?: readonly string[];
  keepDirectories?: readonly string[];
  logger?: Logger;
}

export type UpdateOutcome =
  | { status: 'up-to-date' }
  | { status: 'updated'; firmware: FirmwareDescriptor; files: number };
