// Forwards a scan payload to the AI scanning API and translates the outcome
import axios from 'axios';
import type { Principal } from '../auth/types';
import { DownstreamError, DownstreamUnavailableError } from '../errors';
import type { Logger } from '../logger';
import { redactScanPayload } from '../utils/redact';
import { createScanClient } from './scanClient';

export interface ScanResponse {
  status: 'success';
  result: unknown;
  user_id: string;
}

export interface ScanOptions {
  // Aborted when the caller goes away; the downstream request is dropped with it
  signal?: AbortSignal;
}

function describeTransportError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export class ScanProxy {
  constructor(
    private readonly scanApiUrl: string,
    private readonly logger: Logger,
  ) {}

  async handle(payload: Record<string, unknown>, principal: Principal, options: ScanOptions = {}): Promise<ScanResponse> {
    const user = principal.username;
    this.logger.info({ user, request: redactScanPayload(payload) }, 'Scan request received');

    const client = createScanClient();
    let status: number;
    let body: unknown;
    try {
      const response = await client.post(this.scanApiUrl, payload, { signal: options.signal });
      status = response.status;
      body = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        this.logger.error({ user, downstreamStatus: err.response.status }, 'AI service returned an error status');
        throw new DownstreamError(err.response.status, err.response.status);
      }
      const reason = describeTransportError(err);
      if (options.signal?.aborted) {
        this.logger.warn({ user, reason }, 'Caller disconnected; scan request abandoned');
      } else {
        this.logger.error({ user, reason }, 'Failed to reach AI service');
      }
      throw new DownstreamUnavailableError(reason);
    }

    const result = this.parseBody(body);
    if (result === undefined) {
      this.logger.error({ user, downstreamStatus: status }, 'AI service returned a body that is not JSON');
      throw new DownstreamError(502, status);
    }

    this.logger.info({ user, downstreamStatus: status }, 'Scan completed');
    return { status: 'success', result, user_id: user };
  }

  private parseBody(body: unknown): unknown {
    if (typeof body !== 'string') {
      return body ?? undefined;
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch {
      return undefined;
    }
  }
}
