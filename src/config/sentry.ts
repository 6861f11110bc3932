import * as Sentry from '@sentry/node';
import { config } from './env';

export function initSentry(): boolean {
  if (!config.SENTRY_DSN) return false;

  Sentry.init({
    dsn: config.SENTRY_DSN,
    // Uploaded invoices carry supplier data; keep PII out of events
    sendDefaultPii: false,
    tracesSampleRate: config.NODE_ENV === 'production' ? 0.1 : 1.0,
    debug: config.NODE_ENV === 'development',
    environment: config.NODE_ENV,
  });
  return true;
}
