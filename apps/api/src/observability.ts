function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(0, Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1));
  return sorted[rank] || 0;
}

export type StatusClass = '2xx' | '3xx' | '4xx' | '5xx';

const STATUS_CLASSES: readonly StatusClass[] = ['2xx', '3xx', '4xx', '5xx'];

export type ObservabilitySnapshot = {
  startedAtMs: number;
  uptimeMs: number;
  http: {
    total: number;
    errorTotal: number;
    errorRate: number;
    latencyP95Ms: number;
    byStatusClass: Record<StatusClass, number>;
  };
  users: {
    total: number;
  };
};

function statusClass(statusCode: number): StatusClass {
  if (statusCode >= 500) return '5xx';
  if (statusCode >= 400) return '4xx';
  if (statusCode >= 300) return '3xx';
  return '2xx';
}

export class ApiObservability {
  private readonly startedAtMs: number;

  private requestTotal = 0;

  private errorTotal = 0;

  private readonly byStatusClass: Record<StatusClass, number> = {
    '2xx': 0,
    '3xx': 0,
    '4xx': 0,
    '5xx': 0,
  };

  private readonly latencyRecent: number[] = [];

  private readonly maxLatencySamples = 1024;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAtMs = now();
  }

  observeRequest(statusCode: number, latencyMs: number): void {
    this.requestTotal += 1;
    if (statusCode >= 400) {
      this.errorTotal += 1;
    }
    this.byStatusClass[statusClass(statusCode)] += 1;
    this.latencyRecent.push(Math.max(0, latencyMs));
    if (this.latencyRecent.length > this.maxLatencySamples) {
      this.latencyRecent.shift();
    }
  }

  snapshot(userCount: number): ObservabilitySnapshot {
    const p95 = percentile(this.latencyRecent, 95);
    const errorRate = this.requestTotal > 0 ? this.errorTotal / this.requestTotal : 0;

    return {
      startedAtMs: this.startedAtMs,
      uptimeMs: this.now() - this.startedAtMs,
      http: {
        total: this.requestTotal,
        errorTotal: this.errorTotal,
        errorRate: Number(errorRate.toFixed(6)),
        latencyP95Ms: Number(p95.toFixed(3)),
        byStatusClass: { ...this.byStatusClass },
      },
      users: {
        total: userCount,
      },
    };
  }

  toPrometheus(userCount: number): string {
    const snap = this.snapshot(userCount);

    const lines = [
      '# HELP usersvc_http_requests_total Total HTTP requests served.',
      '# TYPE usersvc_http_requests_total counter',
      `usersvc_http_requests_total ${snap.http.total}`,
      '# HELP usersvc_http_errors_total Total HTTP responses with status >= 400.',
      '# TYPE usersvc_http_errors_total counter',
      `usersvc_http_errors_total ${snap.http.errorTotal}`,
      '# HELP usersvc_http_responses_total HTTP responses by status class.',
      '# TYPE usersvc_http_responses_total counter',
      ...STATUS_CLASSES.map(
        (cls) => `usersvc_http_responses_total{class="${cls}"} ${snap.http.byStatusClass[cls]}`,
      ),
      '# HELP usersvc_http_error_rate Current HTTP error rate.',
      '# TYPE usersvc_http_error_rate gauge',
      `usersvc_http_error_rate ${snap.http.errorRate}`,
      '# HELP usersvc_http_latency_p95_ms HTTP latency P95 in milliseconds (recent window).',
      '# TYPE usersvc_http_latency_p95_ms gauge',
      `usersvc_http_latency_p95_ms ${snap.http.latencyP95Ms}`,
      '# HELP usersvc_users_total Users currently stored.',
      '# TYPE usersvc_users_total gauge',
      `usersvc_users_total ${snap.users.total}`,
    ];

    return `${lines.join('\n')}\n`;
  }
}
