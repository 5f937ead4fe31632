export interface InboundMessage {
  topic: string;
  payload: string | Buffer;
  /** Transport receive time; the router's clock is used when absent. */
  receivedAt?: Date;
}

export type RouteOutcome = 'stored' | 'diverted';

export interface IngestionDiagnostic {
  topic: string;
  partitionKey: string;
  deviceId?: string;
  reason: string;
  /** False when the error record could not be written either. */
  errorRecordWritten: boolean;
}

export interface TelemetryIngestionPort {
  /** Consumes one message. Never rejects. */
  route(message: InboundMessage): Promise<RouteOutcome>;
}
