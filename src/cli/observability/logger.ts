/**
 * Job logs.
 *
 * One log file per job (`<logDir>/<jobId>.log`). A job runs several commands
 * one after another; the first truncates the file and later ones append, so
 * the file holds the job's complete, ordered output. Output is written line by
 * line as timestamped text, or as JSON lines in structured mode, and can be
 * capped at a byte budget per command.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pipeline, Transform } from 'node:stream';
import { promisify } from 'node:util';

import type { TraceContext } from './tracing.ts';

const pipelineAsync = promisify(pipeline);

interface StructuredPayload {
  timestamp: string;
  jobId: string;
  step?: string;
  message: string;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
  sampled?: boolean;
}

export interface LogOptions {
  readonly logDir: string;
  readonly jobId: string;
  /** Label of the command producing the output, e.g. `install` or `test`. */
  readonly step?: string;
  readonly structured?: boolean;
  /** Keep existing content instead of truncating the file. */
  readonly append?: boolean;
  /** Maximum bytes written for this stream; the rest is dropped with a marker. */
  readonly maxBytes?: number;
  readonly traceContext?: TraceContext;
}

/**
 * Build `LogOptions` leaving out fields that are undefined.
 */
export function makeLogOptions(opts: {
  logDir: string;
  jobId: string;
  step?: string;
  structured?: boolean;
  append?: boolean;
  maxBytes?: number;
  traceContext?: TraceContext;
}): LogOptions {
  const { logDir, jobId, step, structured, append, maxBytes, traceContext } = opts;

  return {
    logDir,
    jobId,
    ...(step === undefined ? {} : { step }),
    ...(structured === undefined ? {} : { structured }),
    ...(append === undefined ? {} : { append }),
    ...(maxBytes === undefined ? {} : { maxBytes }),
    ...(traceContext === undefined ? {} : { traceContext }),
  };
}

export function getLogPath(logDir: string, jobId: string): string {
  return path.join(logDir, `${jobId}.log`);
}

/* -------------------------------------------------------------------------- */
/* Line formatting                                                             */
/* -------------------------------------------------------------------------- */

type LineFormatter = (line: string) => string;

function textFormatter(options: LogOptions): LineFormatter {
  const trace = options.traceContext
    ? ` [trace=${options.traceContext.traceId.slice(0, 8)}]`
    : '';
  const step = options.step === undefined ? '' : ` [${options.step}]`;
  return (line) => {
    const suffix = line.length === 0 ? '' : ` ${line}`;
    return `[${new Date().toISOString()}] [${options.jobId}]${step}${trace}${suffix}`;
  };
}

function structuredFormatter(options: LogOptions): LineFormatter {
  const ctx = options.traceContext;
  return (line) => {
    const payload: StructuredPayload = {
      timestamp: new Date().toISOString(),
      jobId: options.jobId,
      message: line,
    };
    if (options.step !== undefined) {
      payload.step = options.step;
    }
    if (ctx) {
      payload.traceId = ctx.traceId;
      payload.spanId = ctx.spanId;
      if (ctx.parentSpanId !== undefined) {
        payload.parentSpanId = ctx.parentSpanId;
      }
      payload.sampled = ctx.samplingDecision;
    }
    return JSON.stringify(payload);
  };
}

function formatterFor(options: LogOptions): LineFormatter {
  return options.structured === true ? structuredFormatter(options) : textFormatter(options);
}

/**
 * Split chunks on line boundaries and format each complete line.
 */
function createLineTransform(format: LineFormatter): Transform {
  let buffer = '';

  return new Transform({
    transform(chunk: Buffer, _enc, cb): void {
      buffer += chunk.toString('utf8');

      for (;;) {
        const newlineIndex = buffer.indexOf('\n');
        if (newlineIndex < 0) {
          break;
        }
        const line = buffer.slice(0, newlineIndex).replace(/\r$/, '');
        buffer = buffer.slice(newlineIndex + 1);
        this.push(`${format(line)}\n`);
      }

      cb();
    },

    flush(cb): void {
      if (buffer.length > 0) {
        this.push(`${format(buffer)}\n`);
      }
      cb();
    },
  });
}

function truncationNote(options: LogOptions, maxBytes: number): string {
  const timestamp = new Date().toISOString();
  return options.structured === true
    ? `${JSON.stringify({ timestamp, jobId: options.jobId, message: '[TRUNCATED]' })}\n`
    : `[${timestamp}] [${options.jobId}] [TRUNCATED at ${maxBytes} bytes]\n`;
}

/**
 * Pass at most `maxBytes` through, then a single truncation marker.
 */
function createBoundedTransform(options: LogOptions): Transform {
  const { maxBytes } = options;
  if (maxBytes === undefined) {
    return new Transform({
      transform(chunk: Buffer, _enc, cb): void {
        cb(null, chunk);
      },
    });
  }

  let remaining = Math.max(0, maxBytes);
  let truncated = false;

  return new Transform({
    transform(chunk: Buffer, _enc, cb): void {
      if (truncated) {
        cb();
        return;
      }

      const slice = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
      if (slice.length > 0) {
        this.push(slice);
      }
      remaining -= slice.length;

      if (chunk.length > slice.length) {
        truncated = true;
        this.push(truncationNote(options, maxBytes));
      }

      cb();
    },
  });
}

async function closeStream(stream: WriteStream): Promise<void> {
  if (stream.writableFinished || stream.destroyed) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    stream.on('error', reject);
    stream.end(() => resolve());
  });
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

export type StreamLogger = (readStream: NodeJS.ReadableStream) => Promise<void>;

/**
 * Create a logger that copies one command's output into the job log.
 */
export async function createLogger(options: LogOptions): Promise<StreamLogger> {
  await mkdir(options.logDir, { recursive: true });

  const writeStream = createWriteStream(getLogPath(options.logDir, options.jobId), {
    flags: options.append === true ? 'a' : 'w',
  });

  return async (readStream) => {
    try {
      await pipelineAsync(
        readStream,
        createLineTransform(formatterFor(options)),
        createBoundedTransform(options),
        writeStream,
      );
    } finally {
      await closeStream(writeStream);
    }
  };
}

/**
 * Append one formatted message to a job log.
 */
export async function appendToLog(options: LogOptions, message: string): Promise<void> {
  await mkdir(options.logDir, { recursive: true });
  const format = formatterFor(options);
  const lines = message.split('\n').map((line) => `${format(line)}\n`);
  await writeFile(getLogPath(options.logDir, options.jobId), lines.join(''), {
    encoding: 'utf8',
    flag: options.append === false ? 'w' : 'a',
  });
}
