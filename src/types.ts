export type Sample = {
  x: number;
  y: number;
};

// Parallel x/y vectors of one data set
export type SampleSet = {
  x: Float64Array;
  y: Float64Array;
};

export type DomainSpec = {
  xMin: number;
  xMax: number;
  pointCount: number;
};

export type PlotMode = 'points' | 'equation';

export type LinearFit = {
  slope: number;
  intercept: number;
  r2: number; // NaN when y has zero variance
  equation: string;
  predicted: Float64Array; // fit evaluated at the analyzed x values
};

export type SlopeBasis = 'window' | 'full' | 'none';

export type LocalSlope = {
  slope: number;
  basis: SlopeBasis;
};

export type AnalysisResult = {
  x: Float64Array; // filtered, sorted ascending
  y: Float64Array;
  centroid: Sample;
  slopeAtCentroid: number; // NaN when undefined
  fit: LinearFit | null;
  highlighted: Sample[];
};

export type PointRow = {
  id: string;
  x: string;
  y: string;
};

export type DomainFields = {
  xMin: string;
  xMax: string;
  pointCount: string;
};

export type DrawRequest =
  | { mode: 'points'; rows: Pick<PointRow, 'x' | 'y'>[] }
  | { mode: 'equation'; expression: string; domain: DomainFields };

export type ChartBounds = {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
};

export type HighlightMarker = {
  point: Sample;
  label: string;
};

export type ChartModel = {
  mode: PlotMode;
  title: string;
  subtitle: string;
  status: string;
  points: Sample[];
  fitLine: Sample[] | null;
  fitLabel: string | null; // equation and R² of the fit line
  centroid: Sample;
  slopeAtCentroid: number;
  highlighted: HighlightMarker[];
  bounds: ChartBounds;
};
