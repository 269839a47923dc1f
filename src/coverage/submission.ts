/**
 * Coverage: remote submission client.
 *
 * Sends each job's coverage to a hosted coverage service in parallel mode and
 * closes the parallel build once the local barrier has completed. The wire
 * format is plain JSON over HTTPS with a bearer token.
 */

import https from 'node:https';

import { CoverageError } from '../errors/errors.ts';
import type { CoverageArtifact } from './types.ts';

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
}

export type PostJson = (
  url: URL,
  body: string,
  headers: Readonly<Record<string, string>>,
  timeoutMs: number,
) => Promise<HttpResponse>;

/** Upper bound on one request, response body included. */
export const DEFAULT_SUBMISSION_TIMEOUT_MS = 60_000;

export interface SubmissionOptions {
  readonly parallel: boolean;
}

export interface CoverageSubmissionClient {
  submit(artifact: CoverageArtifact, options: SubmissionOptions): Promise<void>;
  finalize(runId: string): Promise<void>;
}

export interface HttpSubmissionConfig {
  readonly endpoint: string;
  readonly runId: string;
  readonly token?: string;
  readonly timeoutMs?: number;
  readonly post?: PostJson;
}

export interface SubmittedFile {
  readonly name: string;
  readonly coveredLines: readonly number[];
  readonly coverableLines: readonly number[];
}

export interface SubmissionPayload {
  readonly runId: string;
  readonly jobId: string;
  readonly artifactId: string;
  readonly parallel: boolean;
  readonly files: readonly SubmittedFile[];
}

function sortedNumbers(values: ReadonlySet<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Wire payload for one artifact, files sorted by path.
 */
export function buildSubmissionPayload(
  runId: string,
  artifact: CoverageArtifact,
  options: SubmissionOptions,
): SubmissionPayload {
  const files = [...artifact.data.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, file]) => ({
      name,
      coveredLines: sortedNumbers(file.coveredLines),
      coverableLines: sortedNumbers(file.coverableLines),
    }));

  return {
    runId,
    jobId: artifact.cellId,
    artifactId: artifact.id,
    parallel: options.parallel,
    files,
  };
}

/**
 * POST a JSON body with node:https and collect the response text. The
 * socket is destroyed once it has been idle for `timeoutMs`.
 */
export const postJson: PostJson = (url, body, headers, timeoutMs) =>
  new Promise((resolve, reject) => {
    const req = https.request(
      url,
      {
        method: 'POST',
        headers: {
          ...headers,
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(body),
        },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.on('error', reject);
        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, body: Buffer.concat(chunks).toString('utf8') });
        });
      },
    );

    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`No response within ${timeoutMs}ms`));
    });
    req.on('error', reject);
    req.write(body);
    req.end();
  });

function joinUrl(endpoint: string, path: string): URL {
  const base = endpoint.endsWith('/') ? endpoint : `${endpoint}/`;
  return new URL(path, base);
}

export class HttpCoverageSubmissionClient implements CoverageSubmissionClient {
  private readonly config: HttpSubmissionConfig;
  private readonly post: PostJson;
  private readonly timeoutMs: number;

  constructor(config: HttpSubmissionConfig) {
    this.config = config;
    this.post = config.post ?? postJson;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SUBMISSION_TIMEOUT_MS;
  }

  async submit(artifact: CoverageArtifact, options: SubmissionOptions): Promise<void> {
    const payload = buildSubmissionPayload(this.config.runId, artifact, options);
    await this.send('jobs', JSON.stringify(payload), `submit ${artifact.cellId}`);
  }

  async finalize(runId: string): Promise<void> {
    await this.send(
      `runs/${encodeURIComponent(runId)}/finalize`,
      JSON.stringify({ runId, status: 'done' }),
      `finalize ${runId}`,
    );
  }

  private async send(path: string, body: string, action: string): Promise<void> {
    const headers: Record<string, string> = { 'User-Agent': 'matrix-ci' };
    if (this.config.token !== undefined && this.config.token !== '') {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    let response: HttpResponse;
    try {
      response = await this.withTimeout(
        this.post(joinUrl(this.config.endpoint, path), body, headers, this.timeoutMs),
      );
    } catch (error) {
      throw new CoverageError('COVERAGE_SUBMISSION_FAILED', `Coverage ${action} failed`, {
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new CoverageError(
        'COVERAGE_SUBMISSION_FAILED',
        `Coverage ${action} rejected: HTTP ${response.statusCode}`,
        { details: { statusCode: response.statusCode, body: response.body } },
      );
    }
  }

  /**
   * Bounds a request whatever transport carries it; `postJson` only watches
   * for an idle socket.
   */
  private async withTimeout<T>(request: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`No response within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([request, expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
