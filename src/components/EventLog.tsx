import type { AnalyticsEvent } from '../engine/events';

interface Props {
  events: AnalyticsEvent[];
  onClear?: () => void;
}

const EventLog = ({ events, onClear }: Props) => {
  return (
    <div className="card stack">
      <div className="form-row" style={{ justifyContent: 'space-between' }}>
        <h3>Event Log</h3>
        {onClear && events.length > 0 && (
          <button className="button" onClick={onClear}>
            Clear
          </button>
        )}
      </div>
      {events.length === 0 ? (
        <div className="muted">No events yet.</div>
      ) : (
        <ul className="event-log">
          {events.map((e) => (
            <li key={e.id} className={`event ${e.severity}`}>
              [{e.severity.toUpperCase()}] {e.message}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default EventLog;
