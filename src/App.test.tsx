// @vitest-environment jsdom
import { StrictMode } from 'react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { bankRow, buildWorkbook, RATIO_HEADERS } from './test/workbooks';
import App from './App';

vi.mock('react-chartjs-2', () => ({
  Chart: () => null,
  Doughnut: () => null,
}));

const bytes = buildWorkbook(
  RATIO_HEADERS,
  ['C', 'A', 'E', 'B', 'D'].map((bank) => bankRow(bank))
);
const fetchMock = vi.fn(async (_path: string) => ({ ok: true, status: 200, arrayBuffer: async () => bytes }));

describe('App', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockClear();
  });

  it('loads the data file once and logs each event once under StrictMode', async () => {
    render(
      <StrictMode>
        <App />
      </StrictMode>
    );
    expect(await screen.findByText('Summary for C')).toBeInTheDocument();
    fireEvent.click(screen.getByRole('button', { name: 'Events' }));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith('/data/line-items.csv');
    expect(screen.getAllByText('[INFO] Loaded 5 banks from /data/line-items.csv')).toHaveLength(1);
    expect(screen.getAllByText('[INFO] Peer set for C: A, B, C, D, E')).toHaveLength(1);
  });

  it('renders the ratio and stress tabs for the selected bank', async () => {
    render(<App />);
    await screen.findByText('Summary for C');

    fireEvent.click(screen.getByRole('button', { name: 'Key Metrics' }));
    expect(screen.getByText('Market Average').nextElementSibling).toHaveTextContent('80.00%');

    fireEvent.click(screen.getByRole('button', { name: 'CCAR Stress Test' }));
    expect(screen.getByText('Market Average').nextElementSibling).toHaveTextContent('N/A');
    expect(screen.getAllByText('Not reported')).toHaveLength(4);
  });
});
