// src/libs/metrics.ts
// ============================================================================
// Prometheus-Metriken des Auth-Service (in-memory, Textformat für /metrics)
// ----------------------------------------------------------------------------
// Feste Metrik-Familien statt freier Namen: jede Familie kennt ihre Labels,
// die Recorder unten sind die einzige Schreibstelle.
// ============================================================================

import type { ChannelName, ChannelStatus, NotificationMessage } from "./notify.js";

export type OtpVerifyOutcome =
  | "verified"
  | "mismatch"
  | "exhausted"
  | "expired"
  | "not_found"
  | "conflict";

export type MagicLinkVerifyOutcome = "verified" | "expired" | "invalid";

type LabelValues = Record<string, string>;

type CounterFamily = {
  kind: "counter";
  help: string;
  series: Map<string, { labels: LabelValues; value: number }>;
};

type HistogramSeries = {
  labels: LabelValues;
  /** kumulativ, Index passend zu DURATION_BUCKETS */
  bucketCounts: number[];
  count: number;
  sum: number;
};

type HistogramFamily = {
  kind: "histogram";
  help: string;
  series: Map<string, HistogramSeries>;
};

const DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10] as const;

function counter(help: string): CounterFamily {
  return { kind: "counter", help, series: new Map() };
}

function histogram(help: string): HistogramFamily {
  return { kind: "histogram", help, series: new Map() };
}

const families = {
  http_requests_total: counter("Total number of HTTP requests"),
  http_request_duration_seconds: histogram("HTTP request duration in seconds"),
  auth_otp_verify_total: counter("OTP verification outcomes"),
  auth_magic_link_verify_total: counter("Magic-link verification outcomes"),
  auth_phone_verify_total: counter("Phone verification outcomes"),
  auth_notification_dispatch_total: counter("Notification channel outcomes"),
  auth_refresh_success_total: counter("Successful refresh rotations"),
  auth_refresh_reuse_detected_total: counter("Refresh tokens presented after rotation"),
};

type CounterName = {
  [K in keyof typeof families]: (typeof families)[K] extends CounterFamily ? K : never;
}[keyof typeof families];

// Labels alphabetisch, damit Schlüssel und Ausgabe stabil sind
function seriesKey(labels: LabelValues): string {
  return Object.keys(labels)
    .sort()
    .map((name) => `${name}=${labels[name]}`)
    .join(",");
}

function inc(name: CounterName, labels: LabelValues = {}) {
  const family: CounterFamily = families[name];
  const key = seriesKey(labels);
  const current = family.series.get(key);
  if (current) current.value += 1;
  else family.series.set(key, { labels, value: 1 });
}

function observeDuration(labels: LabelValues, seconds: number) {
  const family = families.http_request_duration_seconds;
  const key = seriesKey(labels);
  const series = family.series.get(key) ?? {
    labels,
    bucketCounts: DURATION_BUCKETS.map(() => 0),
    count: 0,
    sum: 0,
  };
  family.series.set(key, series);

  series.count += 1;
  series.sum += seconds;
  series.bucketCounts = series.bucketCounts.map((n, i) => {
    const le = DURATION_BUCKETS[i];
    return le !== undefined && seconds <= le ? n + 1 : n;
  });
}

// ---------------------------------------------------------------------------
// Recorder
// ---------------------------------------------------------------------------

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number,
) {
  inc("http_requests_total", { method, route, status: String(statusCode) });
  observeDuration({ method, route }, durationSeconds);
}

export function recordOtpVerify(outcome: OtpVerifyOutcome) {
  inc("auth_otp_verify_total", { outcome });
}

export function recordPhoneVerify(outcome: OtpVerifyOutcome) {
  inc("auth_phone_verify_total", { outcome });
}

export function recordMagicLinkVerify(outcome: MagicLinkVerifyOutcome) {
  inc("auth_magic_link_verify_total", { outcome });
}

export function recordNotificationDispatch(
  channel: ChannelName,
  type: NotificationMessage["type"],
  status: Exclude<ChannelStatus, "skipped">,
) {
  inc("auth_notification_dispatch_total", { channel, type, status });
}

export function recordAuthRefreshSuccess() {
  inc("auth_refresh_success_total");
}

export function recordAuthRefreshReuseDetected() {
  inc("auth_refresh_reuse_detected_total");
}

export function resetMetrics() {
  for (const family of Object.values(families)) family.series.clear();
}

// ---------------------------------------------------------------------------
// Textformat
// ---------------------------------------------------------------------------

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function renderLabels(labels: LabelValues): string {
  const names = Object.keys(labels).sort();
  if (names.length === 0) return "";
  return `{${names.map((name) => `${name}="${escapeLabel(labels[name] ?? "")}"`).join(",")}}`;
}

export function renderPrometheusMetrics(): string {
  const lines: string[] = [];

  for (const [name, family] of Object.entries(families)) {
    lines.push(`# HELP ${name} ${family.help}`);
    lines.push(`# TYPE ${name} ${family.kind}`);

    if (family.kind === "counter") {
      for (const { labels, value } of family.series.values()) {
        lines.push(`${name}${renderLabels(labels)} ${value}`);
      }
      continue;
    }

    for (const series of family.series.values()) {
      DURATION_BUCKETS.forEach((le, i) => {
        const labels = { ...series.labels, le: String(le) };
        lines.push(`${name}_bucket${renderLabels(labels)} ${series.bucketCounts[i] ?? 0}`);
      });
      lines.push(`${name}_bucket${renderLabels({ ...series.labels, le: "+Inf" })} ${series.count}`);
      lines.push(`${name}_sum${renderLabels(series.labels)} ${series.sum}`);
      lines.push(`${name}_count${renderLabels(series.labels)} ${series.count}`);
    }
  }

  return `${lines.join("\n")}\n`;
}
