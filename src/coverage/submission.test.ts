/**
 * Tests for the coverage submission client.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  createArtifact,
  fileCoverage,
} from '../__test-utils__/fixtures/coverage/coverage-fixtures.ts';
import { CoverageError } from '../errors/errors.ts';
import {
  buildSubmissionPayload,
  DEFAULT_SUBMISSION_TIMEOUT_MS,
  HttpCoverageSubmissionClient,
  type HttpResponse,
  type PostJson,
} from './submission.ts';

const ARTIFACT = createArtifact('sha-a', 'cell-a', {
  'pkg/b.py': fileCoverage([3, 1], [1, 2, 3]),
  'pkg/a.py': fileCoverage([], [5]),
});

interface Call {
  url: string;
  body: unknown;
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
}

function recordingPost(response: HttpResponse = { statusCode: 200, body: '{}' }): {
  post: PostJson;
  calls: Call[];
} {
  const calls: Call[] = [];
  const post: PostJson = (url, body, headers, timeoutMs) => {
    calls.push({ url: url.toString(), body: JSON.parse(body) as unknown, headers, timeoutMs });
    return Promise.resolve(response);
  };
  return { post, calls };
}

describe('buildSubmissionPayload', () => {
  it('sorts files and line numbers', () => {
    expect(buildSubmissionPayload('run-1', ARTIFACT, { parallel: true })).toEqual({
      runId: 'run-1',
      jobId: 'cell-a',
      artifactId: 'sha-a',
      parallel: true,
      files: [
        { name: 'pkg/a.py', coveredLines: [], coverableLines: [5] },
        { name: 'pkg/b.py', coveredLines: [1, 3], coverableLines: [1, 2, 3] },
      ],
    });
  });
});

describe('HttpCoverageSubmissionClient', () => {
  it('posts each artifact to the jobs endpoint with a bearer token', async () => {
    const { post, calls } = recordingPost();
    const client = new HttpCoverageSubmissionClient({
      endpoint: 'https://coverage.example.test/api',
      runId: 'run-1',
      token: 'test-secret',
      post,
    });

    await client.submit(ARTIFACT, { parallel: true });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://coverage.example.test/api/jobs');
    expect(calls[0]?.headers['Authorization']).toBe('Bearer test-secret');
    expect(calls[0]?.body).toMatchObject({ jobId: 'cell-a', parallel: true });
    expect(calls[0]?.timeoutMs).toBe(DEFAULT_SUBMISSION_TIMEOUT_MS);
  });

  it('closes the parallel build on finalize', async () => {
    const { post, calls } = recordingPost();
    const client = new HttpCoverageSubmissionClient({
      endpoint: 'https://coverage.example.test/api/',
      runId: 'run 1',
      post,
    });

    await client.finalize('run 1');

    expect(calls[0]?.url).toBe('https://coverage.example.test/api/runs/run%201/finalize');
    expect(calls[0]?.body).toEqual({ runId: 'run 1', status: 'done' });
    expect(calls[0]?.headers['Authorization']).toBeUndefined();
  });

  it('raises a submission error for a non-2xx response', async () => {
    const { post } = recordingPost({ statusCode: 422, body: 'bad' });
    const client = new HttpCoverageSubmissionClient({
      endpoint: 'https://coverage.example.test',
      runId: 'run-1',
      post,
    });

    const error: unknown = await client.submit(ARTIFACT, { parallel: true }).catch((e) => e);

    expect(error).toBeInstanceOf(CoverageError);
    expect(error).toMatchObject({
      code: 'COVERAGE_SUBMISSION_FAILED',
      message: 'Coverage submit cell-a rejected: HTTP 422',
    });
  });

  it('wraps transport failures', async () => {
    const post = vi.fn<PostJson>(() => Promise.reject(new Error('ECONNRESET')));
    const client = new HttpCoverageSubmissionClient({
      endpoint: 'https://coverage.example.test',
      runId: 'run-1',
      post,
    });

    await expect(client.finalize('run-1')).rejects.toMatchObject({
      code: 'COVERAGE_SUBMISSION_FAILED',
      message: 'Coverage finalize run-1 failed',
    });
  });

  describe('with a service that never answers', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('gives up after the configured timeout', async () => {
      vi.useFakeTimers();
      const post = vi.fn<PostJson>(() => new Promise<HttpResponse>(() => undefined));
      const client = new HttpCoverageSubmissionClient({
        endpoint: 'https://coverage.example.test',
        runId: 'run-1',
        timeoutMs: 50,
        post,
      });

      const pending: Promise<unknown> = client.submit(ARTIFACT, { parallel: true }).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(50);
      const error = await pending;

      expect(post).toHaveBeenCalledWith(expect.any(URL), expect.any(String), expect.any(Object), 50);
      expect(error).toBeInstanceOf(CoverageError);
      expect(error).toMatchObject({
        code: 'COVERAGE_SUBMISSION_FAILED',
        message: 'Coverage submit cell-a failed',
        cause: { message: 'No response within 50ms' },
      });
    });

    it('bounds finalize the same way', async () => {
      vi.useFakeTimers();
      const client = new HttpCoverageSubmissionClient({
        endpoint: 'https://coverage.example.test',
        runId: 'run-1',
        timeoutMs: 20,
        post: () => new Promise<HttpResponse>(() => undefined),
      });

      const pending: Promise<unknown> = client.finalize('run-1').catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(20);

      expect(await pending).toMatchObject({ message: 'Coverage finalize run-1 failed' });
    });
  });
});
