/**
 * Error Taxonomy - codes for the failures a refresh cycle can run into
 *
 * None of these is fatal to the process: state file problems degrade to
 * "no baseline", capture problems abandon a single cycle.
 */

export type MonitorErrorCode =
  // State file
  | 'STATE_NOT_FOUND'
  | 'STATE_READ_FAILED'
  | 'STATE_PARSE_FAILED'
  | 'STATE_INVALID'
  | 'STATE_WRITE_FAILED'
  // Snapshot source
  | 'SNAPSHOT_CAPTURE_FAILED';

export interface ErrorInfo {
  title: string;
  description: string;
  severity: 'info' | 'warning' | 'error';
  retryable: boolean;
}

export const ERROR_TAXONOMY: Record<MonitorErrorCode, ErrorInfo> = {
  STATE_NOT_FOUND: {
    title: 'No Persisted State',
    description: 'The state file does not exist yet. Starting without a baseline.',
    severity: 'info',
    retryable: false,
  },
  STATE_READ_FAILED: {
    title: 'State File Unreadable',
    description: 'The state file exists but could not be read. Starting without a baseline.',
    severity: 'warning',
    retryable: false,
  },
  STATE_PARSE_FAILED: {
    title: 'State File Corrupt',
    description: 'The state file is not valid JSON. Starting without a baseline.',
    severity: 'warning',
    retryable: false,
  },
  STATE_INVALID: {
    title: 'State File Malformed',
    description: 'The state file is JSON but not an interface snapshot. Starting without a baseline.',
    severity: 'warning',
    retryable: false,
  },
  STATE_WRITE_FAILED: {
    title: 'State Not Persisted',
    description: 'The snapshot could not be written. In-memory state is still updated.',
    severity: 'error',
    retryable: true,
  },
  SNAPSHOT_CAPTURE_FAILED: {
    title: 'Snapshot Capture Failed',
    description: 'Interface addresses could not be read. The previous state stays visible.',
    severity: 'error',
    retryable: true,
  },
};

/**
 * Format a taxonomy entry for a log line
 */
export function describeError(code: MonitorErrorCode, detail?: string): string {
  const info = ERROR_TAXONOMY[code];
  const base = `[${code}] ${info.title}: ${info.description}`;
  return detail ? `${base} (${detail})` : base;
}

export class SnapshotCaptureError extends Error {
  readonly code: MonitorErrorCode = 'SNAPSHOT_CAPTURE_FAILED';

  constructor(message: string, readonly originalError?: unknown) {
    super(message);
    this.name = 'SnapshotCaptureError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
