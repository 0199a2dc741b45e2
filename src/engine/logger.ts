import type { RunReport, StepName, StepReport } from './types';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const STEP_COLORS: Record<StepName, string> = {
  bucket: COLORS.blue,
  'bucket-ready': COLORS.blue,
  database: COLORS.cyan,
  fetch: COLORS.magenta,
  upload: COLORS.green,
  table: COLORS.cyan,
  'query-output': COLORS.yellow,
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

const formatElapsed = (elapsed: number): string => {
  if (elapsed < 60_000) {
    return `${(elapsed / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsed / 60_000);
  const seconds = Math.round((elapsed % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

const stepTag = (step: StepName): string => `${STEP_COLORS[step]}${step.padEnd(12)}${COLORS.reset}`;

const statusLabel = (report: StepReport): string => {
  switch (report.status) {
    case 'succeeded':
      return `${COLORS.green}ok${COLORS.reset}     `;
    case 'skipped':
      return `${COLORS.dim}skipped${COLORS.reset}`;
    case 'failed':
      return `${COLORS.red}FAILED${COLORS.reset} `;
  }
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  step: (step: StepName, message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${stepTag(step)}  ${message}`);
  },

  stepError: (step: StepName, errorType: string, detail: string) => {
    console.error(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${stepTag(step)}  ${COLORS.red}${errorType}${COLORS.reset}  ${detail}`
    );
  },

  pipeline: {
    start: (config: { region: string; bucketName: string; databaseName: string; failurePolicy: string }) => {
      const lines = [
        '',
        `${COLORS.bold}Data lake setup started${COLORS.reset}`,
        `  region:         ${config.region}`,
        `  bucket:         ${config.bucketName}`,
        `  glue database:  ${config.databaseName}`,
        `  on failure:     ${config.failurePolicy}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (report: RunReport) => {
      const status = (() => {
        if (!report.completed) {
          return `${COLORS.yellow}${COLORS.bold}INCOMPLETE${COLORS.reset}`;
        }
        if (report.failedSteps.length > 0) {
          return `${COLORS.yellow}${COLORS.bold}COMPLETED WITH FAILURES${COLORS.reset}`;
        }
        return `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`;
      })();

      const stepLines = report.steps.map((s) => {
        const detail = s.error ? `${COLORS.red}${s.error.message}${COLORS.reset}` : s.detail ?? '';
        return `  ${stepTag(s.step)}  ${statusLabel(s)}  ${detail}`;
      });

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(report.elapsedMs)})${COLORS.reset}`,
        '',
        ...stepLines,
        '',
        `  fetch:    ${report.fetch}`,
        `  records:  ${COLORS.bold}${formatNumber(report.recordCount)}${COLORS.reset}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },
};

type SdkErrorShape = {
  name: string;
  message: string;
  $fault?: string;
  $metadata?: { httpStatusCode?: number; requestId?: string };
};

const isSdkError = (err: unknown): err is SdkErrorShape =>
  err !== null && typeof err === 'object' && '$metadata' in err && 'name' in err && 'message' in err;

/**
 * Render an AWS SDK error as aligned key/value lines for the log.
 * Non-SDK errors collapse to their first message line.
 */
export const formatAwsError = (err: unknown): string => {
  if (!isSdkError(err)) {
    const msg = err instanceof Error ? err.message : String(err);
    return msg.split('\n')[0].slice(0, 200);
  }

  const fields: Array<[string, string | undefined]> = [
    ['name', err.name],
    ['fault', err.$fault],
    ['status', err.$metadata?.httpStatusCode?.toString()],
    ['requestId', err.$metadata?.requestId],
    ['message', err.message],
  ];

  const padding = '                      ';
  return fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${padding}${COLORS.dim}${k.padEnd(12)}${COLORS.reset}${v}`)
    .join('\n');
};
