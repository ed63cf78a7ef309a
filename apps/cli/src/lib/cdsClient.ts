import { setTimeout as delay } from 'node:timers/promises';

import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { z } from 'zod';

import { DEFAULT_POLL_INTERVAL_MS } from './config';
import { CdsClientError } from './errors';
import { writeFileAtomic } from './fs';

export type CdsRequest = Record<string, unknown>;

export interface CdsClientOptions {
  url: string;
  key: string;
  pollIntervalMs?: number;
  fetchTimeoutMs?: number;
  maxPolls?: number;
  userAgent?: string;
}

/** Anything that can fetch a dataset request into a local file. */
export interface DatasetRetriever {
  retrieve(dataset: string, request: CdsRequest, targetPath: string): Promise<string>;
}

const jobSchema = z.object({
  jobID: z.string().min(1),
  status: z.string()
});

const jobStatusSchema = z.object({
  status: z.string()
});

const jobResultsSchema = z.object({
  asset: z.object({
    value: z.object({
      href: z.string().min(1)
    })
  })
});

const problemSchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional()
});

const FAILED_STATUSES = new Set(['failed', 'dismissed', 'rejected']);

function parseBody<T>(schema: z.ZodType<T>, payload: unknown, context: string, statusCode: number): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new CdsClientError(`Unexpected response from CDS API (${context})`, {
      statusCode,
      reason: 'INVALID_RESPONSE',
      details: result.error.issues
    });
  }
  return result.data;
}

/**
 * Client for the CDS retrieve API: submit a process execution, poll the job
 * until it settles, then download the result asset.
 */
export class CdsClient implements DatasetRetriever {
  private readonly baseUrl: string;
  private readonly key: string;
  private readonly pollIntervalMs: number;
  private readonly fetchTimeoutMs?: number;
  private readonly maxPolls?: number;
  private readonly userAgent?: string;

  constructor(options: CdsClientOptions) {
    if (!options.url) {
      throw new Error('CdsClient requires a url');
    }
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.key = options.key;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.maxPolls = options.maxPolls;
    this.userAgent = options.userAgent;
  }

  async retrieve(dataset: string, request: CdsRequest, targetPath: string): Promise<string> {
    const submitted = await this.requestJson('POST', `/retrieve/v1/processes/${encodeURIComponent(dataset)}/execution`, {
      inputs: request
    });
    const job = parseBody(jobSchema, submitted.payload, 'job submission', submitted.statusCode);
    await this.waitForJob(job.jobID, job.status);

    const results = await this.requestJson('GET', `${this.jobPath(job.jobID)}/results`);
    const { asset } = parseBody(jobResultsSchema, results.payload, 'job results', results.statusCode);

    const assetUrl = new URL(asset.value.href, `${this.baseUrl}/`);
    const response = await this.send('GET', assetUrl);
    const content = new Uint8Array(await response.arrayBuffer());
    await writeFileAtomic(targetPath, content);
    return targetPath;
  }

  private jobPath(jobId: string): string {
    return `/retrieve/v1/jobs/${encodeURIComponent(jobId)}`;
  }

  private async waitForJob(jobId: string, initialStatus: string): Promise<void> {
    let status = initialStatus;
    let polls = 0;
    while (status !== 'successful') {
      if (FAILED_STATUSES.has(status)) {
        await this.failJob(jobId, status);
      }
      if (this.maxPolls !== undefined && polls >= this.maxPolls) {
        throw new CdsClientError(`Timed out waiting for CDS job ${jobId} (last status '${status}')`, {
          statusCode: 0,
          reason: 'TIMEOUT'
        });
      }
      polls += 1;
      await delay(this.pollIntervalMs);
      const current = await this.requestJson('GET', this.jobPath(jobId));
      status = parseBody(jobStatusSchema, current.payload, 'job status', current.statusCode).status;
    }
  }

  // The results endpoint of a failed job answers with the failure details.
  private async failJob(jobId: string, status: string): Promise<never> {
    await this.requestJson('GET', `${this.jobPath(jobId)}/results`);
    throw new CdsClientError(`CDS job ${jobId} finished with status '${status}'`, {
      statusCode: 0,
      reason: status
    });
  }

  private async requestJson(
    method: string,
    path: string,
    body?: unknown
  ): Promise<{ statusCode: number; payload: unknown }> {
    const response = await this.send(method, new URL(`${this.baseUrl}${path}`), body);
    try {
      return { statusCode: response.status, payload: await response.json() };
    } catch {
      throw new CdsClientError(`CDS API returned a non-JSON response for ${method} ${path}`, {
        statusCode: response.status,
        reason: 'INVALID_RESPONSE'
      });
    }
  }

  private async send(method: string, url: URL, body?: unknown): Promise<Response> {
    const headers = new Headers({ Accept: 'application/json', 'PRIVATE-TOKEN': this.key });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    let payload: string | undefined;
    if (body !== undefined) {
      payload = JSON.stringify(body);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body: payload, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new CdsClientError(`CDS request timed out: ${method} ${url.pathname}`, {
          statusCode: 0,
          reason: 'ABORTED'
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new CdsClientError(`CDS request failed: ${reason}`, { statusCode: 0, reason: 'NETWORK' });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }

    if (!response.ok) {
      await this.handleErrorResponse(response);
    }
    return response;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      payload = text;
    }

    const problem = problemSchema.safeParse(payload);
    const detail = problem.success ? (problem.data.detail ?? problem.data.title) : undefined;
    const message = detail || response.statusText || 'CDS request failed';
    throw new CdsClientError(`CDS API request failed (${response.status}): ${message}`, {
      statusCode: response.status,
      reason: problem.success ? (problem.data.title ?? null) : null,
      details: payload
    });
  }
}
