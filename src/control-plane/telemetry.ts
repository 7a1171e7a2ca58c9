import type { TelemetrySink, TelemetrySpan } from "../contracts/telemetry";
import type { SessionLogger } from "../logger";
import type { ControlPlaneStore } from "../store/control_plane_store";

export const SERVICE_NAME = "autoauth-policy-retrieval";

export const noopTelemetrySink: TelemetrySink = {
  record() {},
};

export class LoggingTelemetrySink implements TelemetrySink {
  constructor(private readonly log: SessionLogger) {}

  record(span: TelemetrySpan): void {
    this.log.debug({ evt: "telemetry.span", ...span }, "telemetry.span");
  }
}

export class StoreTelemetrySink implements TelemetrySink {
  constructor(
    private readonly store: ControlPlaneStore,
    private readonly sessionId: string
  ) {}

  async record(span: TelemetrySpan): Promise<void> {
    await this.store.appendSpan({ sessionId: this.sessionId, span });
  }
}

export class CompositeTelemetrySink implements TelemetrySink {
  private readonly sinks: TelemetrySink[];

  constructor(sinks: TelemetrySink[]) {
    this.sinks = sinks;
  }

  async record(span: TelemetrySpan): Promise<void> {
    await Promise.all(this.sinks.map(async (sink) => sink.record(span)));
  }
}

/**
 * Hands a span to the sink without waiting on it. Sink failures are logged and
 * never reach the caller.
 */
export function emitSpan(sink: TelemetrySink, span: TelemetrySpan, log: SessionLogger): Promise<void> {
  const report = (error: unknown) => {
    log.warn(
      { evt: "telemetry.sink_failed", operation: span.operation, error: String(error) },
      "telemetry.sink_failed"
    );
  };

  try {
    return Promise.resolve(sink.record(span)).catch(report);
  } catch (error) {
    report(error);
    return Promise.resolve();
  }
}
