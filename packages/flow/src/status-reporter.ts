/**
 * Status Reporters — how a running flow tells the store what happened.
 *
 * LocalStatusReporter calls the protocol in the same process.
 * HttpStatusReporter POSTs to the API's /api/status-update endpoint.
 */

import {
  TransportError,
  ValidationError,
  errorMessage,
  type PipelineStore,
  type StatusUpdate,
} from '@pipetrack/shared';
import type { StatusUpdateProtocol } from './status-protocol.js';
import type { PipelineFieldRecorder, PipelineFields, ReportResult, StatusReporter } from './types.js';

export class LocalStatusReporter implements StatusReporter {
  constructor(private readonly protocol: StatusUpdateProtocol) {}

  async report(update: StatusUpdate): Promise<ReportResult> {
    const result = await this.protocol.applyStatusUpdate(update);
    if (result.ok) return { ok: true };
    return { ok: false, reason: result.reason, message: result.message };
  }
}

// ─── HTTP ────────────────────────────────────────────────────────

export interface WireStatusUpdate {
  pipeline_id: number;
  stage_name?: string;
  status: string;
  error_message?: string;
  records_processed?: number;
}

export function toWireStatusUpdate(update: StatusUpdate): WireStatusUpdate {
  return {
    pipeline_id: update.pipelineId,
    ...(update.stageName !== undefined ? { stage_name: update.stageName } : {}),
    status: update.status,
    ...(update.errorMessage !== undefined ? { error_message: update.errorMessage } : {}),
    ...(update.recordsProcessed !== undefined ? { records_processed: update.recordsProcessed } : {}),
  };
}

export interface HttpStatusReporterOptions {
  baseUrl: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export class HttpStatusReporter implements StatusReporter {
  private endpoint: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(opts: HttpStatusReporterOptions) {
    this.endpoint = `${opts.baseUrl.replace(/\/+$/, '')}/api/status-update`;
    this.fetchImpl = opts.fetch ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  async report(update: StatusUpdate): Promise<ReportResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(toWireStatusUpdate(update)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Status update delivery failed: ${errorMessage(err)}`, { cause: err });
    }

    if (response.ok) return { ok: true };

    const body = await readJson(response);
    const detail = typeof body.error === 'string' ? body.error : response.statusText;

    // a 404 without a reason is a wrong endpoint, not a missing pipeline
    const reason = body.reason;
    if (response.status === 404 && (reason === 'pipeline_not_found' || reason === 'stage_not_found')) {
      return { ok: false, reason, message: detail };
    }
    if (response.status === 400) {
      throw new ValidationError(`Status update rejected: ${detail}`, [detail]);
    }
    throw new TransportError(`Status endpoint answered ${response.status}: ${detail}`, {
      status: response.status,
    });
  }
}

async function readJson(response: Response): Promise<Record<string, unknown>> {
  const text = await response.text();
  if (text === '') return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return { error: text };
  }
}

// ─── Field recording ─────────────────────────────────────────────

/**
 * Writes run id and file names straight to the store. These are not status
 * transitions, so they bypass the protocol.
 */
export function storeFieldRecorder(store: PipelineStore): PipelineFieldRecorder {
  return {
    recordFields(pipelineId: number, fields: PipelineFields): void {
      store.updatePipeline(pipelineId, fields);
    },
  };
}
