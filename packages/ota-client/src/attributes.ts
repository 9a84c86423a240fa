import { z } from 'zod';
import type { Logger } from 'pino';
import { InvalidResponseError } from './errors';
import { silentLogger } from './logger';
import type { RequestExecutor } from './requestExecutor';
import type { AttributeClientOptions, FirmwareDescriptor, UpdateStatus } from './types';

export const FW_TITLE_ATTR = 'fw_title';
export const FW_VERSION_ATTR = 'fw_version';
export const FW_URL_ATTR = 'fw_url';
export const FW_STATE_ATTR = 'fw_state';
export const FW_ERROR_ATTR = 'fw_error';

export const FIRMWARE_ATTRIBUTE_KEYS = [FW_TITLE_ATTR, FW_VERSION_ATTR, FW_URL_ATTR] as const;

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()]).nullish();

const firmwareAttributesSchema = z
  .object({
    fw_title: attributeValueSchema,
    fw_version: attributeValueSchema,
    fw_url: attributeValueSchema
  })
  .passthrough();

type FirmwareAttributes = z.infer<typeof firmwareAttributesSchema>;

const sharedAttributesResponseSchema = z.object({ shared: firmwareAttributesSchema.optional() }).passthrough();
const clientAttributesResponseSchema = z.object({ client: firmwareAttributesSchema.optional() }).passthrough();

type AttributeValue = z.infer<typeof attributeValueSchema>;

function normalizeValue(value: AttributeValue): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return String(value);
}

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Both sides are compared as strings; the backend may hand back `2` where `"2"` was published.
 */
export function isFirmwareDifferent(desired: FirmwareDescriptor, current: FirmwareDescriptor): boolean {
  return desired.title !== current.title || String(desired.version) !== String(current.version);
}

export function describeFirmware(descriptor: FirmwareDescriptor): string {
  return `${descriptor.title}@${descriptor.version}`;
}

/**
 * Client for the fleet backend's device attribute and telemetry HTTP API.
 */
export class AttributeClient {
  private readonly executor: RequestExecutor;
  private readonly logger: Logger;
  private readonly attributesUrl: string;
  private readonly telemetryUrl: string;

  constructor(executor: RequestExecutor, options: AttributeClientOptions) {
    if (!options.baseUrl) {
      throw new Error('AttributeClient requires a baseUrl');
    }
    if (!options.deviceToken) {
      throw new Error('AttributeClient requires a deviceToken');
    }
    this.executor = executor;
    this.logger = options.logger ?? silentLogger;
    const deviceUrl = `${trimTrailingSlashes(options.baseUrl)}/api/v1/${encodeURIComponent(options.deviceToken)}`;
    this.attributesUrl = `${deviceUrl}/attributes`;
    this.telemetryUrl = `${deviceUrl}/telemetry`;
  }

  async fetchDesiredFirmware(): Promise<FirmwareDescriptor | null> {
    const url = this.buildAttributeUrl('sharedKeys');
    const payload = sharedAttributesResponseSchema.safeParse(await this.executor.getJson(url));
    if (!payload.success) {
      throw new InvalidResponseError(url, payload.error.issues);
    }
    const attributes: FirmwareAttributes = payload.data.shared ?? {};
    const title = normalizeValue(attributes.fw_title);
    const version = normalizeValue(attributes.fw_version);
    const sourceUrl = normalizeValue(attributes.fw_url);
    if (title === null || version === null || sourceUrl === null) {
      return null;
    }
    return { title, version, sourceUrl };
  }

  async fetchCurrentFirmware(): Promise<FirmwareDescriptor> {
    const url = this.buildAttributeUrl('clientKeys');
    const payload = clientAttributesResponseSchema.safeParse(await this.executor.getJson(url));
    if (!payload.success) {
      throw new InvalidResponseError(url, payload.error.issues);
    }
    const attributes: FirmwareAttributes = payload.data.client ?? {};
    return {
      title: normalizeValue(attributes.fw_title) ?? '',
      version: normalizeValue(attributes.fw_version) ?? '',
      sourceUrl: normalizeValue(attributes.fw_url) ?? ''
    };
  }

  async isUpdateAvailable(): Promise<boolean> {
    const desired = await this.fetchDesiredFirmware();
    if (!desired) {
      this.logger.debug('No firmware published in shared attributes');
      return false;
    }
    const current = await this.fetchCurrentFirmware();
    return isFirmwareDifferent(desired, current);
  }

  async reportStatus(current: FirmwareDescriptor, status: UpdateStatus): Promise<void> {
    this.logger.debug({ status }, 'Reporting firmware status');
    await this.sendTelemetry({
      [`current_${FW_TITLE_ATTR}`]: current.title,
      [`current_${FW_VERSION_ATTR}`]: current.version,
      [FW_STATE_ATTR]: status
    });
  }

  async reportFailure(error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    await this.sendTelemetry({
      [FW_STATE_ATTR]: 'FAILED' satisfies UpdateStatus,
      [FW_ERROR_ATTR]: message
    });
  }

  async publishCurrentFirmware(descriptor: FirmwareDescriptor): Promise<void> {
    await this.executor.postJson(this.attributesUrl, {
      [FW_TITLE_ATTR]: descriptor.title,
      [FW_VERSION_ATTR]: descriptor.version,
      [FW_URL_ATTR]: descriptor.sourceUrl
    });
  }

  async sendTelemetry(data: Record<string, string>): Promise<void> {
    await this.executor.postJson(this.telemetryUrl, data);
  }

  private buildAttributeUrl(keyType: 'sharedKeys' | 'clientKeys'): string {
    return `${this.attributesUrl}?${keyType}=${FIRMWARE_ATTRIBUTE_KEYS.join(',')}`;
  }
}
