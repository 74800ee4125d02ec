export interface LogEvent {
  stage: string;
  [field: string]: unknown;
}

// stdout is reserved for the resolved record
export function log(event: LogEvent) {
  console.error(JSON.stringify({
    timestamp: new Date().toISOString(),
    ...event
  }));
}
