// Used by the UI to present what happened during a load or an analysis run.
export type EventSeverity = 'info' | 'warning' | 'error';

export interface AnalyticsEvent {
  id: string;
  severity: EventSeverity;
  message: string;
  timestamp: number;
}

/** Helper to create an AnalyticsEvent with current timestamp */
let eventSequence = 0;
export const createEvent = (severity: EventSeverity, message: string): AnalyticsEvent => {
  const timestamp = Date.now();
  const id = `evt-${timestamp}-${eventSequence++}`;
  return {
    id,
    severity,
    message,
    timestamp,
  };
};
