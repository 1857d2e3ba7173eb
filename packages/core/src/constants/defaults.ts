/**
 * Engine and check default values.
 */
import { availableParallelism } from "node:os";

// Worker pool defaults
export const MAX_DEFAULT_WORKERS = 32;
export const EXTRA_IO_WORKERS = 4;

// Identity prefix for requests submitted without one
export const ORDINAL_IDENTITY_PREFIX = "check-";

// Check I/O defaults
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
export const DEFAULT_TLS_TIMEOUT_MS = 30_000;
export const DEFAULT_MAIL_TIMEOUT_MS = 30_000;
export const DEFAULT_DNS_TIMEOUT_MS = 10_000;

// Certificate expiry thresholds
export const DEFAULT_CERT_WARNING_DAYS = 30;
export const DEFAULT_CERT_CRITICAL_DAYS = 14;

// DNS propagation
export const DEFAULT_PROPAGATION_THRESHOLD = 80;
export const PROPAGATION_WARNING_RATIO = 0.7;
export const DEFAULT_PROPAGATION_WORKERS = 10;

// Mail handshake
export const MAIL_CLIENT_NAME = "hostprobe.local";
export const MAIL_PORTS = {
  smtp: { plain: 25, ssl: 465 },
  imap: { plain: 143, ssl: 993 },
  pop3: { plain: 110, ssl: 995 },
} as const;

/**
 * Default pool size: host cores plus a few I/O slots, capped at
 * MAX_DEFAULT_WORKERS.
 */
export function defaultMaxWorkers(): number {
  return Math.min(MAX_DEFAULT_WORKERS, availableParallelism() + EXTRA_IO_WORKERS);
}
