/**
 * HTTP client for the challenge test server's management API
 */

import { request } from 'undici';

import { DEFAULT_MANAGEMENT_URL } from '../constants/defaults.js';
import { ManagementApiError } from '../errors/errors.js';
import type { ChallengeLookup } from '../registry/challenge-registry.js';
import { MANAGEMENT_ROUTES } from '../server/management-api.js';

export interface ManagementClientOptions {
  /** Base URL of the management API. Defaults to http://localhost:8055. */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
}

export class ManagementClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ManagementClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_MANAGEMENT_URL;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async addTlsAlpn01(host: string, keyAuthorization: string): Promise<void> {
    await this.post(MANAGEMENT_ROUTES.addTlsAlpn01, { host, content: keyAuthorization });
  }

  async deleteTlsAlpn01(host: string): Promise<void> {
    await this.post(MANAGEMENT_ROUTES.deleteTlsAlpn01, { host });
  }

  async getTlsAlpn01(host: string): Promise<ChallengeLookup> {
    const body = await this.post(MANAGEMENT_ROUTES.getTlsAlpn01, { host });
    if (
      typeof body !== 'object' ||
      body === null ||
      !('content' in body) ||
      typeof body.content !== 'string' ||
      !('found' in body) ||
      typeof body.found !== 'boolean'
    ) {
      throw ManagementApiError.invalidResponse(MANAGEMENT_ROUTES.getTlsAlpn01);
    }
    return { keyAuthorization: body.content, found: body.found };
  }

  private async post(path: string, payload: Record<string, string>): Promise<unknown> {
    const response = await request(new URL(path, this.baseUrl), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });

    const text = await response.body.text();
    if (response.statusCode !== 200) {
      throw ManagementApiError.requestFailed(path, response.statusCode, text);
    }
    try {
      return JSON.parse(text);
    } catch {
      throw ManagementApiError.invalidResponse(path);
    }
  }
}
