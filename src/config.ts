import type { DomainFields } from './types';

export const DEFAULT_EXPRESSION = 'sin(x) + 0.5*x';

export const DEFAULT_DOMAIN: DomainFields = {
  xMin: '-10',
  xMax: '10',
  pointCount: '400',
};

export const INITIAL_ROW_COUNT = 5;

// Minimum samples for an equation domain
export const MIN_POINT_COUNT = 10;

// Neighbours taken on each side of G for the local slope
export const SLOPE_WINDOW = 3;

export const HIGHLIGHT_COUNT = 2;

// y = x^2 sampled at integers
export const SAMPLE_POINTS: [number, number][] = [-2, -1, 0, 1, 2].map((x) => [x, x * x]);

export const CHART_COLORS = {
  data: '#1f77b4',
  fit: '#ff7f0e',
  centroid: '#d62728',
  highlight: '#2ca02c',
};

export const EMPTY_STATUS = 'G Point: —    |    Slope at G: —';
