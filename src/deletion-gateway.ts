/**
 * Deletion gateway: hands one deletion intent per physical file to the
 * archive application, which performs and logs the actual removal.
 */

import { Logger, errorMessage } from './logger.js';
import type { FileId } from './types.js';

export type DeletionResult =
  | { success: true; reference: string }
  | { success: false; errorMessage: string };

export interface DeletionGateway {
  requestDeletion(fileId: FileId, instancePath: string): Promise<DeletionResult>;
}

export interface ArchivesAppGatewayOptions {
  url: string;
  user: string;
  password: string;
  fetchImpl?: typeof fetch;
}

const MAX_REFERENCE_LENGTH = 200;

export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Gateway over the archive application's `server_change` endpoint.
 * Never throws: every failure comes back as `{ success: false }`.
 */
export class ArchivesAppGateway implements DeletionGateway {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger = new Logger({ context: 'DeletionGateway' });

  constructor(options: ArchivesAppGatewayOptions) {
    this.baseUrl = normalizeBaseUrl(options.url);
    this.headers = { user: options.user, password: options.password };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildDeleteUrl(instancePath: string): string {
    const params = new URLSearchParams({ edit_type: 'DELETE', old_path: instancePath, new_path: '' });
    return `${this.baseUrl}/api/server_change?${params.toString()}`;
  }

  async requestDeletion(fileId: FileId, instancePath: string): Promise<DeletionResult> {
    const url = this.buildDeleteUrl(instancePath);
    this.logger.debug('Requesting deletion', { fileId, instancePath });

    try {
      const response = await this.fetchImpl(url, { method: 'GET', headers: this.headers });
      const body = (await response.text()).trim();

      if (!response.ok) {
        const detail = body ? `: ${body.slice(0, MAX_REFERENCE_LENGTH)}` : '';
        return { success: false, errorMessage: `HTTP ${response.status} ${response.statusText}${detail}`.trim() };
      }

      return {
        success: true,
        reference: body ? body.slice(0, MAX_REFERENCE_LENGTH) : `HTTP ${response.status}`
      };
    } catch (error) {
      return { success: false, errorMessage: errorMessage(error) };
    }
  }
}
