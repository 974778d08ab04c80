export type OperationEventType =
  | "operation.started"
  | "operation.phase"
  | "operation.completed"
  | "operation.failed"
  | "extraction.issue";

export interface OperationEvent {
  seq: number;
  type: OperationEventType;
  payload: Record<string, unknown>;
}

export function formatOperationEvent(event: OperationEvent): string {
  return `#${event.seq} ${event.type} ${JSON.stringify(event.payload)}`;
}
