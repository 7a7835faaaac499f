import { createContext, useContext, useEffect, useState } from 'react';

export type Theme = 'light' | 'dark';

/** Current page theme; chart colours are re-read whenever it changes. */
export const ThemeContext = createContext<Theme>('light');

export type ChartColors = {
  accent: string;
  accentFill: string;
  highlight: string;
  warn: string;
  good: string;
  border: string;
  borderStrong: string;
  dim: string;
  marker: string;
};

const FALLBACK: Omit<ChartColors, 'accentFill'> = {
  accent: '#1f77b4',
  highlight: '#ff7f0e',
  warn: '#d62728',
  good: '#2ca02c',
  border: '#dde1e7',
  borderStrong: '#bcc3cd',
  dim: '#6b7280',
  marker: '#1d2330',
};

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

// Only six-digit hex is translucent; anything else is drawn opaque.
const withAlpha = (color: string, alpha: number): string => {
  const match = HEX_COLOR.exec(color);
  if (!match) return color;
  const [r, g, b] = match.slice(1).map((part) => parseInt(part, 16));
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
};

export const readChartColors = (root: HTMLElement = document.documentElement): ChartColors => {
  const styles = getComputedStyle(root);
  const read = (name: string, fallback: string) => styles.getPropertyValue(name).trim() || fallback;
  const accent = read('--accent', FALLBACK.accent);
  return {
    accent,
    accentFill: withAlpha(accent, 0.55),
    highlight: read('--highlight', FALLBACK.highlight),
    warn: read('--warn', FALLBACK.warn),
    good: read('--good', FALLBACK.good),
    border: read('--border', FALLBACK.border),
    borderStrong: read('--border-strong', FALLBACK.borderStrong),
    dim: read('--dim', FALLBACK.dim),
    marker: read('--text', FALLBACK.marker),
  };
};

/**
 * Chart colours from the CSS variables of the active theme. The theme attribute
 * is applied in a layout effect, so the passive effect here sees the new values.
 */
export const useChartColors = (): ChartColors => {
  const theme = useContext(ThemeContext);
  const [colors, setColors] = useState(() => readChartColors());
  useEffect(() => {
    setColors(readChartColors());
  }, [theme]);
  return colors;
};
