// @vitest-environment jsdom
import { describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import type { AnalyticsEvent } from '../engine/events';
import EventLog from './EventLog';

const events: AnalyticsEvent[] = [
  { id: 'evt-1', severity: 'info', message: 'Loaded 4 banks from upload.xlsx', timestamp: 1 },
  { id: 'evt-2', severity: 'warning', message: 'NPAs to total loans undefined for Birch Bank: Loans is zero', timestamp: 2 },
];

describe('EventLog', () => {
  it('shows an empty state', () => {
    render(<EventLog events={[]} />);
    expect(screen.getByText('No events yet.')).toBeInTheDocument();
  });

  it('prefixes each message with its severity', () => {
    render(<EventLog events={events} />);
    expect(screen.getByText('[WARNING] NPAs to total loans undefined for Birch Bank: Loans is zero')).toHaveClass(
      'event',
      'warning'
    );
  });

  it('clears on request', () => {
    const onClear = vi.fn();
    render(<EventLog events={events} onClear={onClear} />);
    fireEvent.click(screen.getByRole('button', { name: 'Clear' }));
    expect(onClear).toHaveBeenCalledTimes(1);
  });
});
