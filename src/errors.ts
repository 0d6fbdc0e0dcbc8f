import { createLogger } from './logger';

const log = createLogger('errors');

export type ErrorSource = 'unhandled' | 'promise' | 'host' | 'handler';

export interface ErrorReport {
  message: string;
  stack?: string;
  source: ErrorSource;
  timestamp: string;
  context?: Record<string, unknown>;
}

const MAX_HISTORY = 50;
const history: ErrorReport[] = [];

export function toErrorReport(
  error: unknown,
  source: ErrorSource,
  context?: Record<string, unknown>,
): ErrorReport {
  const report: ErrorReport = {
    message: error instanceof Error ? error.message : String(error),
    source,
    timestamp: new Date().toISOString(),
  };
  if (error instanceof Error && error.stack) {
    report.stack = error.stack;
  }
  if (context) {
    report.context = context;
  }
  return report;
}

/** Logs the failure and keeps it for diagnostics. Nothing is shown to the user. */
export function reportError(
  error: unknown,
  source: ErrorSource = 'handler',
  context?: Record<string, unknown>,
): ErrorReport {
  const report = toErrorReport(error, source, context);
  history.push(report);
  if (history.length > MAX_HISTORY) {
    history.shift();
  }
  log.error(report.message, { source, ...context });
  return report;
}

export function getErrorHistory(): readonly ErrorReport[] {
  return history;
}

export function clearErrorHistory(): void {
  history.length = 0;
}

/** Routes uncaught errors and unhandled rejections of a webview into {@link reportError}. */
export function installErrorHandlers(target: Window): () => void {
  const onError = (event: ErrorEvent): void => {
    reportError(event.error ?? event.message, 'unhandled', {
      file: event.filename,
      line: event.lineno,
    });
  };
  const onRejection = (event: PromiseRejectionEvent): void => {
    reportError(event.reason, 'promise');
  };

  target.addEventListener('error', onError);
  target.addEventListener('unhandledrejection', onRejection);
  return () => {
    target.removeEventListener('error', onError);
    target.removeEventListener('unhandledrejection', onRejection);
  };
}
