import type { Curve, HLine, PlotOptions } from './types';

/**
 * Chained construction of `PlotOptions`. Every setter returns the builder.
 */
export interface PlotBuilder {
  /** Adds a curve; its bounds join the plot bounds. */
  curve(curve: Curve): PlotBuilder;
  /** Adds a horizontal line; its y joins the plot's y-bounds. */
  hline(hline: HLine): PlotBuilder;
  /** Expands the y-bounds to include `y`. */
  includeY(y: number): PlotBuilder;
  symmetricalXBounds(enabled: boolean): PlotBuilder;
  symmetricalYBounds(enabled: boolean): PlotBuilder;
  /** Padding around the data in screen points. */
  margin(x: number, y: number): PlotBuilder;
  width(width: number): PlotBuilder;
  height(height: number): PlotBuilder;
  /** width / height */
  aspectRatio(aspectRatio: number): PlotBuilder;
  showX(show: boolean): PlotBuilder;
  showY(show: boolean): PlotBuilder;
  theme(theme: NonNullable<PlotOptions['theme']>): PlotBuilder;
  /** Snapshot of the accumulated options. Later builder calls do not affect it. */
  build(): PlotOptions;
}

type MutableOptions = { -readonly [K in keyof PlotOptions]: PlotOptions[K] };

export function createPlotBuilder(): PlotBuilder {
  const curves: Curve[] = [];
  const hlines: HLine[] = [];
  const includeY: number[] = [];
  const options: MutableOptions = {};

  const set = <K extends keyof MutableOptions>(key: K, value: MutableOptions[K]): PlotBuilder => {
    options[key] = value;
    return self;
  };

  const self: PlotBuilder = {
    curve(curve) {
      curves.push(curve);
      return self;
    },
    hline(hline) {
      hlines.push(hline);
      return self;
    },
    includeY(y) {
      includeY.push(y);
      return self;
    },
    symmetricalXBounds: (enabled) => set('symmetricalXBounds', enabled),
    symmetricalYBounds: (enabled) => set('symmetricalYBounds', enabled),
    margin: (x, y) => set('margin', { x, y }),
    width: (width) => set('width', width),
    height: (height) => set('height', height),
    aspectRatio: (aspectRatio) => set('aspectRatio', aspectRatio),
    showX: (show) => set('showX', show),
    showY: (show) => set('showY', show),
    theme: (theme) => set('theme', theme),
    build() {
      return {
        ...options,
        curves: curves.slice(),
        hlines: hlines.slice(),
        includeY: includeY.slice(),
      };
    },
  };

  return self;
}
