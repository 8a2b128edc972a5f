/**
 * Central export point for all type definitions
 */

export * from './enums';
export * from './config';
export type { PageError, ScanResult, ScanSummary, ScanReport, SourceLocation } from './scan-result';
export type { ScanEvents, ScanEventName, AttemptFailure, ScanFatalReason } from './events';
