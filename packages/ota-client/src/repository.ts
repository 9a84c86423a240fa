import { z } from 'zod';
import type { Logger } from 'pino';
import {
  EmptyRepositoryError,
  InvalidRepositoryUrlError,
  InvalidResponseError,
  RequestFailedError
} from './errors';
import { silentLogger } from './logger';
import type { RequestExecutor } from './requestExecutor';
import type { DownloadedFile, RemoteFile, RepositoryLocation, RepositorySourceOptions } from './types';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_RAW_BASE_URL = 'https://raw.githubusercontent.com';
export const DEFAULT_BRANCH = 'main';

const REPOSITORY_URL_PATTERN = /^https?:\/\/[^/\s]+\/([^/\s]+)\/([^/\s]+)(?:\/([^/\s]+))?\/?$/;

const treeEntrySchema = z
  .object({
    path: z.string().min(1),
    type: z.string(),
    sha: z.string().min(1)
  })
  .passthrough();

const treeResponseSchema = z
  .object({
    tree: z.array(treeEntrySchema).optional()
  })
  .passthrough();

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function encodePath(filePath: string): string {
  return filePath.split('/').map(encodeURIComponent).join('/');
}

export function parseRepositoryUrl(url: string): RepositoryLocation {
  const match = REPOSITORY_URL_PATTERN.exec(url.trim());
  if (!match) {
    throw new InvalidRepositoryUrlError(url);
  }
  const [, owner, repo, token] = match;
  return { owner, repo, accessToken: token ?? null };
}

export function buildAuthHeaders(location: RepositoryLocation): Record<string, string> {
  if (location.accessToken === null) {
    return {};
  }
  return { Authorization: `Bearer ${location.accessToken}` };
}

/**
 * Lists and downloads firmware files from a hosted git repository. Downloads are
 * strictly sequential so only one file's bytes are held at a time.
 */
export class RepositorySource {
  private readonly executor: RequestExecutor;
  private readonly apiBaseUrl: string;
  private readonly rawBaseUrl: string;
  private readonly branch: string;
  private readonly logger: Logger;

  constructor(executor: RequestExecutor, options: RepositorySourceOptions = {}) {
    this.executor = executor;
    this.apiBaseUrl = trimTrailingSlashes(options.apiBaseUrl ?? DEFAULT_API_BASE_URL);
    this.rawBaseUrl = trimTrailingSlashes(options.rawBaseUrl ?? DEFAULT_RAW_BASE_URL);
    this.branch = options.branch ?? DEFAULT_BRANCH;
    this.logger = options.logger ?? silentLogger;
  }

  async listFiles(location: RepositoryLocation): Promise<RemoteFile[]> {
    const url = `${this.apiBaseUrl}/repos/${encodeURIComponent(location.owner)}/${encodeURIComponent(
      location.repo
    )}/git/trees/${encodeURIComponent(this.branch)}?recursive=1`;

    let payload: unknown;
    try {
      payload = await this.executor.getJson(url, buildAuthHeaders(location));
    } catch (err) {
      if (err instanceof RequestFailedError && err.statusCode === 404) {
        throw new EmptyRepositoryError(this.branch);
      }
      throw err;
    }

    const parsed = treeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidResponseError(url, parsed.error.issues);
    }
    const files = (parsed.data.tree ?? [])
      .filter((entry) => entry.type === 'blob')
      .map((entry) => ({ path: entry.path, contentDigest: entry.sha.toLowerCase() }) satisfies RemoteFile);
    if (files.length === 0) {
      throw new EmptyRepositoryError(this.branch);
    }
    return files;
  }

  async downloadFile(location: RepositoryLocation, file: RemoteFile): Promise<DownloadedFile> {
    const url = `${this.rawBaseUrl}/${encodeURIComponent(location.owner)}/${encodeURIComponent(
      location.repo
    )}/${encodeURIComponent(this.branch)}/${encodePath(file.path)}`;
    this.logger.info({ url }, `Downloading: ${file.path}`);
    const bytes = await this.executor.getBytes(url, buildAuthHeaders(location));
    return { ...file, bytes };
  }

  /**
   * Resolves once the file listing is known, so URL and empty-repository errors surface
   * before any download. The returned iterable downloads lazily and can be consumed once.
   */
  async openFirmware(repositoryUrl: string): Promise<AsyncIterable<DownloadedFile>> {
    const location = parseRepositoryUrl(repositoryUrl);
    const files = await this.listFiles(location);
    this.logger.info(
      { owner: location.owner, repo: location.repo, files: files.length },
      'Listed firmware repository'
    );
    return this.downloadSequentially(location, files);
  }

  private async *downloadSequentially(
    location: RepositoryLocation,
    files: RemoteFile[]
  ): AsyncGenerator<DownloadedFile> {
    for (const file of files) {
      yield await this.downloadFile(location, file);
    }
  }
}
