import type { PipelineError } from './errors';

export type StepName = 'bucket' | 'bucket-ready' | 'database' | 'fetch' | 'upload' | 'table' | 'query-output';

export const STEP_ORDER: readonly StepName[] = [
  'bucket',
  'bucket-ready',
  'database',
  'fetch',
  'upload',
  'table',
  'query-output',
];

export type StepStatus = 'succeeded' | 'skipped' | 'failed';

export type StepReport = {
  step: StepName;
  status: StepStatus;
  /** Step-specific outcome, e.g. "created", "already-owned", "uploaded 2 records" */
  detail?: string;
  error?: PipelineError;
};

/**
 * How the fetch step ended.
 * "degraded" means the request failed and was treated as zero records.
 */
export type FetchStatus = 'fetched' | 'empty' | 'degraded';

export type RunReport = {
  steps: StepReport[];
  fetch: FetchStatus | 'not-run';
  recordCount: number;
  failedSteps: StepName[];
  /** False when the run was interrupted or aborted before reaching the end */
  completed: boolean;
  elapsedMs: number;
};

export type FailurePolicy = 'continue' | 'abort';

export type PipelineConfig = {
  region: string;
  bucketName: string;
  databaseName: string;
  apiKey: string;
  endpoint: string;
  fetchTimeoutMs: number;
  bucketReady: {
    maxAttempts: number;
    intervalMs: number;
  };
};

export type PipelineHooks = {
  /** Called after each step settles, including skipped steps */
  onStepComplete?: (report: StepReport) => void;
};

export type PipelineOptions = {
  failurePolicy?: FailurePolicy;
  hooks?: PipelineHooks;
  /** Checked between steps; a true value stops the run and skips what is left */
  shouldStop?: () => boolean;
};
