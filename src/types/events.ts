import { ScanConfiguration } from './config';
import { AttemptFailureType, LogLevel, PageStatus } from './enums';
import { PageError, ScanResult, ScanSummary } from './scan-result';

export type ScanFatalReason =
  | 'no_urls'
  | 'invalid_input'
  | 'browser_launch_failed'
  | 'browser_restart_failed';

export interface AttemptFailure {
  type: AttemptFailureType;
  message: string;
  httpStatus?: number;
}

/**
 * Event map of the scan engine
 */
export interface ScanEvents {
  scanStarted: { scanId: string; total: number; config: ScanConfiguration };
  pageStarted: { url: string; index: number; total: number };
  errorObserved: { url: string; error: PageError; status: PageStatus };
  attemptFailed: { url: string; attempt: number; failure: AttemptFailure; retryInMs?: number };
  pageFinished: { url: string; result: ScanResult; completed: number; total: number };
  urlSkipped: { url: string; reason: 'filtered' | 'duplicate' };
  browserRestarted: { generation: number };
  scanFatal: { reason: ScanFatalReason; message: string };
  scanCompleted: ScanSummary;
  log: { level: LogLevel; message: string };
}

export type ScanEventName = keyof ScanEvents;
