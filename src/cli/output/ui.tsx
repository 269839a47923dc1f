/**
 * Ink dashboard.
 *
 * Read-only rendering of job state: one row per matrix cell plus the
 * documentation run. On a TTY the table updates live; otherwise a single
 * static table is printed once every row has settled.
 */

import pathLib from 'node:path';
import { pathToFileURL } from 'node:url';

import { Box, render, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useEffect, useMemo, useState } from 'react';

import type { CellStatus } from '../modules/types.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface DashboardRow {
  readonly id: string;
  readonly label: string;
  readonly logPath: string;
}

interface RowState extends DashboardRow {
  readonly status: CellStatus;
  readonly detail?: string;
}

type StatusListener = (id: string, status: CellStatus, detail?: string) => void;

interface DashboardProps {
  readonly rows: readonly DashboardRow[];
  readonly onComplete: () => void;
  readonly subscribe: (listener: StatusListener) => void;
}

export interface DashboardStreams {
  readonly stdout?: NodeJS.WriteStream;
  readonly stderr?: NodeJS.WriteStream;
}

export interface DashboardHandle {
  updateStatus: (this: void, id: string, status: CellStatus, detail?: string) => void;
  waitForExit: (this: void) => Promise<void>;
}

/* -------------------------------------------------------------------------- */
/* Utilities                                                                  */
/* -------------------------------------------------------------------------- */

function supportsOsc8(): boolean {
  // biome-ignore lint/complexity/useLiteralKeys: Access via index signature satisfies TS4111
  const term = process.env['TERM'];
  // biome-ignore lint/complexity/useLiteralKeys: Access via index signature satisfies TS4111
  const termProgram = process.env['TERM_PROGRAM'];

  if (termProgram === 'iTerm.app' || termProgram === 'WezTerm') {
    return true;
  }
  if (typeof term === 'string' && term.includes('linux')) {
    return false;
  }
  return typeof term === 'string' && term !== '' && term !== 'dumb';
}

function createHyperlink(text: string, url: string): string {
  return `\u001b]8;;${url}\u0007${text}\u001b]8;;\u0007`;
}

/**
 * Color output unless NO_COLOR is set (https://no-color.org/) or the terminal is dumb.
 */
function supportsColor(): boolean {
  // biome-ignore lint/complexity/useLiteralKeys: Access via index signature satisfies TS4111
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // biome-ignore lint/complexity/useLiteralKeys: Access via index signature satisfies TS4111
  return process.env['TERM'] !== 'dumb';
}

const ANSI_CODES = {
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  dim: '\u001b[2m',
  underline: '\u001b[4m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  cyan: '\u001b[36m',
} as const;

type AnsiName = keyof typeof ANSI_CODES;

function colorize(text: string, ...names: readonly AnsiName[]): string {
  if (!supportsColor() || names.length === 0) {
    return text;
  }
  return `${names.map((name) => ANSI_CODES[name]).join('')}${text}${ANSI_CODES.reset}`;
}

// Exposed for tests to exercise utility branches.
export const __test__ = {
  supportsOsc8,
  supportsColor,
};

/* -------------------------------------------------------------------------- */
/* Status rendering (shared between TTY and non-TTY)                         */
/* -------------------------------------------------------------------------- */

/**
 * Each status pairs a color with a symbol so it reads without color too.
 */
const STATUS_CONFIG = {
  PENDING: { symbol: '○', label: 'PENDING', color: 'gray', ansi: 'dim' },
  RUNNING: { symbol: '◐', label: 'RUNNING', color: 'blue', ansi: 'blue' },
  PASS: { symbol: '✔', label: 'PASS', color: 'green', ansi: 'green' },
  FAIL: { symbol: '✘', label: 'FAIL', color: 'red', ansi: 'red' },
  ERROR: { symbol: '⚠', label: 'ERROR', color: 'yellow', ansi: 'yellow' },
  SKIPPED: { symbol: '⊝', label: 'SKIPPED', color: 'yellow', ansi: 'yellow' },
} as const satisfies Record<
  CellStatus,
  { symbol: string; label: string; color: string; ansi: AnsiName }
>;

const SETTLED: ReadonlySet<CellStatus> = new Set(['PASS', 'FAIL', 'ERROR', 'SKIPPED']);

export const UI_CONSTANTS = {
  COLUMN_WIDTH: {
    JOB: 36,
    STATUS: 14,
    DETAIL: 16,
  },
  TITLE: 'MATRIX CI',
  HEADERS: {
    JOB: 'Job',
    STATUS: 'Status',
    DETAIL: 'Stage',
    LOG: 'Log',
  },
} as const;

export interface RowSummary {
  readonly total: number;
  readonly pass: number;
  readonly fail: number;
  readonly error: number;
  readonly skipped: number;
}

export function summarizeRows(states: readonly { readonly status: CellStatus }[]): RowSummary {
  return {
    total: states.length,
    pass: states.filter((s) => s.status === 'PASS').length,
    fail: states.filter((s) => s.status === 'FAIL').length,
    error: states.filter((s) => s.status === 'ERROR').length,
    skipped: states.filter((s) => s.status === 'SKIPPED').length,
  };
}

function initialStates(rows: readonly DashboardRow[]): RowState[] {
  return rows.map((row) => ({ ...row, status: 'PENDING' }));
}

function applyUpdate(
  states: readonly RowState[],
  id: string,
  status: CellStatus,
  detail?: string,
): RowState[] {
  return states.map((s) => {
    if (s.id !== id || (s.status === status && s.detail === detail)) {
      return s;
    }
    const row: RowState = { id: s.id, label: s.label, logPath: s.logPath, status };
    return detail === undefined ? row : { ...row, detail };
  });
}

/* -------------------------------------------------------------------------- */
/* Components                                                                 */
/* -------------------------------------------------------------------------- */

const Header: React.FC = () => (
  <Box
    borderStyle="double"
    borderColor="cyan"
    paddingX={2}
    paddingY={1}
    flexDirection="column"
    alignItems="center"
    justifyContent="center"
  >
    <Text bold>{UI_CONSTANTS.TITLE}</Text>
  </Box>
);

const StatusIndicator: React.FC<{ readonly status: CellStatus }> = ({ status }) => {
  const config = STATUS_CONFIG[status];

  if (status === 'RUNNING') {
    return (
      <Text color={config.color}>
        <Spinner type="dots" /> {config.label}
      </Text>
    );
  }

  return (
    <Text color={config.color}>
      {config.symbol} {config.label}
    </Text>
  );
};

const LogLink: React.FC<{ readonly path: string; readonly status: CellStatus }> = ({
  path,
  status,
}) => {
  if (status === 'PENDING' || status === 'SKIPPED') {
    return <Text dimColor>-</Text>;
  }

  const display = supportsOsc8()
    ? createHyperlink('View Log', pathToFileURL(pathLib.resolve(path)).href)
    : path;

  return <Text>{display}</Text>;
};

const StatusTable: React.FC<{ readonly states: readonly RowState[] }> = ({ states }) => (
  <Box flexDirection="column" marginY={1}>
    <Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.JOB}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.JOB}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.STATUS}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.DETAIL}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.DETAIL}
        </Text>
      </Box>
      <Text bold underline>
        {UI_CONSTANTS.HEADERS.LOG}
      </Text>
    </Box>

    {states.map((s) => (
      <Box key={s.id}>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.JOB}>
          <Text>{s.label}</Text>
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
          <StatusIndicator status={s.status} />
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.DETAIL}>
          <Text dimColor>{s.detail ?? ''}</Text>
        </Box>
        <LogLink path={s.logPath} status={s.status} />
      </Box>
    ))}
  </Box>
);

const SummaryFooter: React.FC<{
  readonly states: readonly RowState[];
  readonly duration: number;
}> = ({ states, duration }) => {
  const summary = useMemo(() => summarizeRows(states), [states]);

  return (
    <Box borderStyle="single" borderColor="gray" padding={1} flexDirection="column">
      <Text bold>Summary</Text>
      <Text>
        Total: {summary.total} |{' '}
        <Text color="green" bold>
          ✔ Pass: {summary.pass}
        </Text>{' '}
        |{' '}
        <Text color="red" bold>
          ✘ Fail: {summary.fail}
        </Text>{' '}
        |{' '}
        <Text color="yellow" bold>
          ⚠ Error: {summary.error}
        </Text>{' '}
        |{' '}
        <Text color="yellow" dimColor>
          ⊝ Skipped: {summary.skipped}
        </Text>
      </Text>
      <Text>Duration: {(duration / 1000).toFixed(2)}s</Text>
    </Box>
  );
};

/* -------------------------------------------------------------------------- */
/* Non-TTY renderer                                                           */
/* -------------------------------------------------------------------------- */

function statusLabel(status: CellStatus): string {
  const config = STATUS_CONFIG[status];
  return `${config.symbol} ${config.label}`;
}

/**
 * Plain table of the final state. Padding is applied before coloring so
 * columns line up with or without ANSI codes.
 */
export function formatStaticDashboard(
  states: readonly (DashboardRow & { readonly status: CellStatus; readonly detail?: string })[],
  durationMs: number,
): string {
  const { JOB, STATUS, DETAIL } = UI_CONSTANTS.COLUMN_WIDTH;
  const { HEADERS } = UI_CONSTANTS;

  const headerRow =
    colorize(HEADERS.JOB.padEnd(JOB), 'bold', 'underline') +
    colorize(HEADERS.STATUS.padEnd(STATUS), 'bold', 'underline') +
    colorize(HEADERS.DETAIL.padEnd(DETAIL), 'bold', 'underline') +
    colorize(HEADERS.LOG, 'bold', 'underline');

  const lines = [colorize(UI_CONSTANTS.TITLE, 'bold', 'cyan'), '', headerRow];

  for (const state of states) {
    const log =
      state.status === 'PENDING' || state.status === 'SKIPPED' ? colorize('-', 'dim') : state.logPath;
    lines.push(
      state.label.padEnd(JOB) +
        colorize(statusLabel(state.status).padEnd(STATUS), STATUS_CONFIG[state.status].ansi) +
        (state.detail ?? '').padEnd(DETAIL) +
        log,
    );
  }

  const summary = summarizeRows(states);
  const passLabel = colorize(`Pass: ${summary.pass}`, 'green');
  const failLabel = colorize(`Fail: ${summary.fail}`, 'red');
  const errorLabel = colorize(`Error: ${summary.error}`, 'yellow');
  const skippedLabel = colorize(`Skipped: ${summary.skipped}`, 'yellow');

  lines.push(
    '',
    colorize('Summary', 'bold'),
    `Total: ${summary.total} | ${passLabel} | ${failLabel} | ${errorLabel} | ${skippedLabel}`,
    `Duration: ${(durationMs / 1000).toFixed(2)}s`,
    '',
  );

  return `${lines.join('\n')}\n`;
}

/* -------------------------------------------------------------------------- */
/* Dashboard                                                                  */
/* -------------------------------------------------------------------------- */

const Dashboard: React.FC<DashboardProps> = ({ rows, subscribe, onComplete }) => {
  const [states, setStates] = useState<RowState[]>(() => initialStates(rows));
  const [startTime] = useState(() => Date.now());
  const [done, setDone] = useState(false);
  const [duration, setDuration] = useState(0);

  useEffect(() => {
    subscribe((id, status, detail) => {
      setStates((prev) => applyUpdate(prev, id, status, detail));
    });
  }, [subscribe]);

  useEffect(() => {
    if (!done && states.every((s) => SETTLED.has(s.status))) {
      setDone(true);
      setDuration(Date.now() - startTime);
      onComplete();
    }
  }, [states, done, startTime, onComplete]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />
      <StatusTable states={states} />
      {done && <SummaryFooter states={states} duration={duration} />}
    </Box>
  );
};

function createStaticRenderer(
  rows: readonly DashboardRow[],
  stdout: NodeJS.WriteStream,
  now: () => number,
): DashboardHandle {
  let states = initialStates(rows);
  const startTime = now();
  let rendered = false;

  return {
    updateStatus: (id, status, detail) => {
      states = applyUpdate(states, id, status, detail);
    },
    waitForExit: () => {
      if (!rendered) {
        rendered = true;
        stdout.write(formatStaticDashboard(states, now() - startTime));
      }
      return Promise.resolve();
    },
  };
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Show the dashboard. `waitForExit` resolves once every row has settled
 * (TTY) or after printing the final table (non-TTY).
 */
export function renderDashboard(
  rows: readonly DashboardRow[],
  streams?: DashboardStreams,
  now: () => number = Date.now,
): DashboardHandle {
  const stdout = streams?.stdout ?? process.stdout;
  const stderr = streams?.stderr ?? process.stderr;

  if (!stdout.isTTY) {
    return createStaticRenderer(rows, stdout, now);
  }

  let listener: StatusListener | undefined;
  const pending: { readonly id: string; readonly status: CellStatus; readonly detail?: string }[] = [];
  let resolveExit: () => void = () => undefined;

  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const { unmount } = render(
    <Dashboard
      rows={rows}
      subscribe={(l) => {
        listener = l;
        for (const event of pending.splice(0)) {
          l(event.id, event.status, event.detail);
        }
      }}
      onComplete={() => resolveExit()}
    />,
    { stdout, stderr },
  );

  return {
    updateStatus: (id, status, detail) => {
      if (listener) {
        listener(id, status, detail);
      } else {
        pending.push(detail === undefined ? { id, status } : { id, status, detail });
      }
    },
    waitForExit: async () => {
      await exitPromise;
      unmount();
    },
  };
}
