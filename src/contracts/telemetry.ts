export type TelemetrySpanStatus = "ok" | "error";

export type TelemetrySpan = {
  service_name: string;
  operation: string;
  start: string;
  end: string;
  status: TelemetrySpanStatus;
  attributes?: Record<string, string | number | boolean>;
};

export interface TelemetrySink {
  record(span: TelemetrySpan): void | Promise<void>;
}
