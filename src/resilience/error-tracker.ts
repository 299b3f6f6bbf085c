import { subDays, subHours } from "date-fns";
import { createLogger, levelForSeverity, type Logger } from "../logger.ts";
import type {
  ErrorCategory,
  ErrorInfo,
  ErrorSeverity,
  ErrorSink,
} from "../types/index.ts";

export interface ErrorSummary {
  totalErrors: number;
  byCategory: Partial<Record<ErrorCategory, number>>;
  bySeverity: Partial<Record<ErrorSeverity, number>>;
  mostCommon: Array<[string, number]>;
  timePeriodHours: number;
}

export interface ErrorTrackerOptions {
  maxErrors?: number;
  retentionDays?: number;
  now?: () => Date;
  logger?: Logger;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Bounded, in-memory log of caught errors. Oldest entries are dropped past
 * `maxErrors`; entries older than the retention window are evicted at most
 * once an hour, on the next `record`.
 */
export class ErrorTracker implements ErrorSink {
  private errors: ErrorInfo[] = [];
  private readonly maxErrors: number;
  private readonly retentionDays: number;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private lastCleanup: Date;

  constructor(options: ErrorTrackerOptions = {}) {
    this.maxErrors = options.maxErrors ?? 1000;
    this.retentionDays = options.retentionDays ?? 7;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("errors");
    this.lastCleanup = this.now();
  }

  record(
    error: unknown,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: Record<string, unknown> = {},
    retryCount = 0
  ): ErrorInfo {
    const info: ErrorInfo = {
      timestamp: this.now(),
      errorType: error instanceof Error ? error.name : typeof error,
      errorMessage: error instanceof Error ? error.message : String(error),
      category,
      severity,
      context,
      stackTrace: error instanceof Error ? (error.stack ?? "") : "",
      retryCount,
      resolved: false,
    };

    this.errors.push(info);
    if (this.errors.length > this.maxErrors) {
      this.errors.splice(0, this.errors.length - this.maxErrors);
    }
    this.cleanupIfDue();

    this.logger[levelForSeverity(severity)](
      `${category} error: ${info.errorMessage}`
    );
    return info;
  }

  getErrorSummary(hours = 24): ErrorSummary {
    const cutoff = subHours(this.now(), hours);
    const recent = this.errors.filter((e) => e.timestamp >= cutoff);

    const byCategory: ErrorSummary["byCategory"] = {};
    const bySeverity: ErrorSummary["bySeverity"] = {};
    const signatures = new Map<string, number>();

    for (const e of recent) {
      byCategory[e.category] = (byCategory[e.category] ?? 0) + 1;
      bySeverity[e.severity] = (bySeverity[e.severity] ?? 0) + 1;
      const signature = `${e.errorType}: ${e.errorMessage.slice(0, 50)}`;
      signatures.set(signature, (signatures.get(signature) ?? 0) + 1);
    }

    // Stable sort keeps first-seen order among equal counts
    const mostCommon = [...signatures.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5);

    return {
      totalErrors: recent.length,
      byCategory,
      bySeverity,
      mostCommon,
      timePeriodHours: hours,
    };
  }

  getErrors(): readonly ErrorInfo[] {
    return this.errors;
  }

  markResolved(index: number): boolean {
    const entry = this.errors[index];
    if (!entry) return false;
    entry.resolved = true;
    return true;
  }

  clear(): void {
    this.errors = [];
  }

  private cleanupIfDue(): void {
    const now = this.now();
    if (now.getTime() - this.lastCleanup.getTime() < CLEANUP_INTERVAL_MS) return;

    const cutoff = subDays(now, this.retentionDays);
    this.errors = this.errors.filter((e) => e.timestamp >= cutoff);
    this.lastCleanup = now;
  }
}
