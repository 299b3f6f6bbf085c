import type { ErrorSummary, ErrorTracker } from "./error-tracker.ts";
import type { HealthState, MetricsSink } from "../types/index.ts";

const MAX_RESPONSE_TIMES = 100;
const HEALTHY_RATE = 0.95;
const DEGRADED_RATE = 0.8;

export interface HealthMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseTimeMs: number;
  lastSuccessTime?: string;
  lastFailureTime?: string;
}

export interface HealthStatus {
  status: HealthState;
  uptimeMs: number;
  successRate: number;
  metrics: HealthMetrics;
  errorSummary: ErrorSummary;
}

export function healthStateFor(successRate: number): HealthState {
  if (successRate >= HEALTHY_RATE) return "healthy";
  if (successRate >= DEGRADED_RATE) return "degraded";
  return "unhealthy";
}

export class HealthMonitor implements MetricsSink {
  private readonly startedAt: number;
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private responseTimes: number[] = [];
  private lastSuccessTime?: Date;
  private lastFailureTime?: Date;

  constructor(
    private readonly errors: Pick<ErrorTracker, "getErrorSummary">,
    private readonly now: () => Date = () => new Date()
  ) {
    this.startedAt = now().getTime();
  }

  recordRequest(success: boolean, responseTimeMs: number): void {
    this.totalRequests++;
    if (success) {
      this.successfulRequests++;
      this.lastSuccessTime = this.now();
    } else {
      this.failedRequests++;
      this.lastFailureTime = this.now();
    }

    this.responseTimes.push(responseTimeMs);
    if (this.responseTimes.length > MAX_RESPONSE_TIMES) {
      this.responseTimes = this.responseTimes.slice(-MAX_RESPONSE_TIMES);
    }
  }

  /** 0 until the first request is recorded. */
  get successRate(): number {
    return this.totalRequests === 0
      ? 0
      : this.successfulRequests / this.totalRequests;
  }

  getHealthStatus(): HealthStatus {
    const times = this.responseTimes;
    const average =
      times.length > 0 ? times.reduce((sum, t) => sum + t, 0) / times.length : 0;

    return {
      status: healthStateFor(this.successRate),
      uptimeMs: this.now().getTime() - this.startedAt,
      successRate: this.successRate,
      metrics: {
        totalRequests: this.totalRequests,
        successfulRequests: this.successfulRequests,
        failedRequests: this.failedRequests,
        averageResponseTimeMs: average,
        lastSuccessTime: this.lastSuccessTime?.toISOString(),
        lastFailureTime: this.lastFailureTime?.toISOString(),
      },
      errorSummary: this.errors.getErrorSummary(1),
    };
  }

  isHealthy(): boolean {
    return healthStateFor(this.successRate) === "healthy";
  }
}
