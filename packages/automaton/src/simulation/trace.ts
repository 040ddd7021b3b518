/**
 * Trace collection for debugging and observability.
 *
 * A simulation reports lifecycle and decision events to a collector; the
 * no-op collector makes tracing free when it is switched off.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  /** Milliseconds since the collector was created. */
  readonly timestamp: number;
  /** Emitting operation, e.g. "simulation.step". */
  readonly source: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(source: string): void;
  end(source: string, durationMs: number): void;
  decision(
    source: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(source: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled = true) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(source: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      source,
      eventType,
      data,
    });
  }

  start(source: string): void {
    this.emit(source, "start");
  }

  end(source: string, durationMs: number): void {
    this.emit(source, "end", { durationMs });
  }

  decision(
    source: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(source, "decision", { question, options, chosen, reason });
  }

  warning(source: string, message: string): void {
    this.emit(source, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_source: string): void {}
  end(_source: string, _durationMs: number): void {}
  decision(
    _source: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_source: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
