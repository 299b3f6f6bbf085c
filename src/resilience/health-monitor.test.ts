import { describe, it, expect } from "vitest";
import { HealthMonitor, healthStateFor } from "./health-monitor.ts";
import type { ErrorSummary } from "./error-tracker.ts";

const emptySummary: ErrorSummary = {
  totalErrors: 0,
  byCategory: {},
  bySeverity: {},
  mostCommon: [],
  timePeriodHours: 1,
};

function monitorWith(successes: number, failures: number) {
  const monitor = new HealthMonitor({ getErrorSummary: () => emptySummary });
  for (let i = 0; i < successes; i++) monitor.recordRequest(true, 100);
  for (let i = 0; i < failures; i++) monitor.recordRequest(false, 300);
  return monitor;
}

describe("healthStateFor", () => {
  it("maps success rates to states", () => {
    expect(healthStateFor(0.95)).toBe("healthy");
    expect(healthStateFor(0.9)).toBe("degraded");
    expect(healthStateFor(0.8)).toBe("degraded");
    expect(healthStateFor(0.79)).toBe("unhealthy");
  });
});

describe("HealthMonitor", () => {
  it("is healthy at 96% success", () => {
    const monitor = monitorWith(96, 4);
    const status = monitor.getHealthStatus();
    expect(status.status).toBe("healthy");
    expect(status.successRate).toBe(0.96);
    expect(monitor.isHealthy()).toBe(true);
  });

  it("is degraded at 85% success", () => {
    expect(monitorWith(85, 15).getHealthStatus().status).toBe("degraded");
  });

  it("is unhealthy at 60% success", () => {
    const monitor = monitorWith(60, 40);
    expect(monitor.getHealthStatus().status).toBe("unhealthy");
    expect(monitor.isHealthy()).toBe(false);
  });

  it("reports zero success before any request", () => {
    const status = monitorWith(0, 0).getHealthStatus();
    expect(status.successRate).toBe(0);
    expect(status.metrics.averageResponseTimeMs).toBe(0);
  });

  it("averages only the last 100 response times", () => {
    const monitor = new HealthMonitor({ getErrorSummary: () => emptySummary });
    for (let i = 0; i < 50; i++) monitor.recordRequest(true, 1000);
    for (let i = 0; i < 100; i++) monitor.recordRequest(true, 200);

    const { metrics } = monitor.getHealthStatus();
    expect(metrics.totalRequests).toBe(150);
    expect(metrics.averageResponseTimeMs).toBe(200);
  });

  it("tracks last success and failure times", () => {
    let now = new Date("2024-03-04T15:00:00Z");
    const monitor = new HealthMonitor({ getErrorSummary: () => emptySummary }, () => now);
    monitor.recordRequest(true, 10);
    now = new Date("2024-03-04T15:05:00Z");
    monitor.recordRequest(false, 10);

    const status = monitor.getHealthStatus();
    expect(status.metrics.lastSuccessTime).toBe("2024-03-04T15:00:00.000Z");
    expect(status.metrics.lastFailureTime).toBe("2024-03-04T15:05:00.000Z");
    expect(status.uptimeMs).toBe(5 * 60 * 1000);
    expect(status.errorSummary).toBe(emptySummary);
  });
});
