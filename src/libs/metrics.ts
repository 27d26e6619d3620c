// src/libs/metrics.ts
// ============================================================================
// Prometheus-Metriken (In-Process, Text-Format 0.0.4)
// ----------------------------------------------------------------------------
// - Counter + Histogramme mit Labels
// - HELP/TYPE pro Metrik-Familie, nicht pro Serie
// - Zähler für Login / Refresh / Logout / Gate-Rejects
// ============================================================================

type Labels = Record<string, string | number | boolean | undefined>;

type MetricKind = "counter" | "histogram";

type HistogramState = {
  labels?: Labels;
  count: number;
  sum: number;
  buckets: { le: number; count: number }[];
};

const HELP: Record<string, { kind: MetricKind; help: string }> = {
  http_requests_total: { kind: "counter", help: "Total number of HTTP requests" },
  http_request_duration_seconds: {
    kind: "histogram",
    help: "HTTP request duration in seconds",
  },
  auth_login_success_total: { kind: "counter", help: "Successful logins" },
  auth_login_failed_total: { kind: "counter", help: "Rejected logins" },
  auth_refresh_success_total: { kind: "counter", help: "Successful refresh rotations" },
  auth_refresh_failed_total: { kind: "counter", help: "Rejected refresh attempts" },
  auth_logout_total: { kind: "counter", help: "Completed logouts (all sessions revoked)" },
  auth_gate_rejected_total: { kind: "counter", help: "Requests rejected by the authentication gate" },
};

const counters = new Map<string, Map<string, { labels?: Labels; value: number }>>();
const histograms = new Map<string, Map<string, HistogramState>>();

const REQUEST_DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function sortedEntries(labels?: Labels): [string, string][] {
  if (!labels) return [];
  return Object.entries(labels)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => [k, String(v)]);
}

function labelKey(labels?: Labels): string {
  return sortedEntries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function labelText(labels?: Labels): string {
  const parts = sortedEntries(labels).map(([k, v]) => `${k}="${escapeLabel(v)}"`);
  return parts.length === 0 ? "" : `{${parts.join(",")}}`;
}

export function incCounter(name: string, labels?: Labels, by = 1) {
  let series = counters.get(name);
  if (!series) {
    series = new Map();
    counters.set(name, series);
  }
  const key = labelKey(labels);
  const current = series.get(key);
  series.set(key, { labels, value: (current?.value ?? 0) + by });
}

export function observeHistogram(
  name: string,
  value: number,
  labels?: Labels,
  buckets: number[] = REQUEST_DURATION_BUCKETS,
) {
  let series = histograms.get(name);
  if (!series) {
    series = new Map();
    histograms.set(name, series);
  }

  const key = labelKey(labels);
  let state = series.get(key);
  if (!state) {
    state = { labels, count: 0, sum: 0, buckets: buckets.map((le) => ({ le, count: 0 })) };
    series.set(key, state);
  }

  state.count += 1;
  state.sum += value;
  for (const bucket of state.buckets) {
    if (value <= bucket.le) bucket.count += 1;
  }
}

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number,
) {
  incCounter("http_requests_total", { method, route, status: statusCode });
  observeHistogram("http_request_duration_seconds", durationSeconds, { method, route });
}

export function recordAuthLogin(success: boolean) {
  incCounter(success ? "auth_login_success_total" : "auth_login_failed_total");
}

export function recordAuthRefresh(success: boolean) {
  incCounter(success ? "auth_refresh_success_total" : "auth_refresh_failed_total");
}

export function recordAuthLogout() {
  incCounter("auth_logout_total");
}

export function recordGateRejected(code: string) {
  incCounter("auth_gate_rejected_total", { code });
}

function header(lines: string[], name: string, fallbackKind: MetricKind) {
  const meta = HELP[name];
  lines.push(`# HELP ${name} ${meta?.help ?? name}`);
  lines.push(`# TYPE ${name} ${meta?.kind ?? fallbackKind}`);
}

export function renderPrometheusMetrics(): string {
  const lines: string[] = [];

  for (const [name, series] of counters) {
    header(lines, name, "counter");
    for (const { labels, value } of series.values()) {
      lines.push(`${name}${labelText(labels)} ${value}`);
    }
  }

  for (const [name, series] of histograms) {
    header(lines, name, "histogram");
    for (const state of series.values()) {
      for (const bucket of state.buckets) {
        lines.push(`${name}_bucket${labelText({ ...state.labels, le: bucket.le })} ${bucket.count}`);
      }
      lines.push(`${name}_bucket${labelText({ ...state.labels, le: "+Inf" })} ${state.count}`);
      lines.push(`${name}_sum${labelText(state.labels)} ${state.sum}`);
      lines.push(`${name}_count${labelText(state.labels)} ${state.count}`);
    }
  }

  return lines.length === 0 ? "\n" : `${lines.join("\n")}\n`;
}
