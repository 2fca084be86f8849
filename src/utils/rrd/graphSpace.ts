import { computeMinMax, computeTimeRange, type DataRange, type TimeRange } from './units';

export interface GraphLayout {
  width: number;
  height: number;
  gridBorder: number;
  leftOffset: number;
  bottomOffset: number;
}

export const DEFAULT_GRAPH_LAYOUT: GraphLayout = {
  width: 800,
  height: 250,
  gridBorder: 10,
  leftOffset: 50,
  bottomOffset: 30,
};

export type CoordinateRange = 'inside-border' | 'outside-border';

/** Maps between data space (epoch seconds, values) and SVG coordinates. */
export class GraphSpace {
  private layout: GraphLayout;
  private data: DataRange = { min: 0, max: 1, interval: 0.1 };
  private time: TimeRange = { min: 0, max: 0, interval: 1, start: 0 };

  constructor(layout: Partial<GraphLayout> = {}) {
    this.layout = { ...DEFAULT_GRAPH_LAYOUT, ...layout };
  }

  update(
    timeData: ReadonlyArray<number>,
    series: ReadonlyArray<ReadonlyArray<number>>,
    includeZero: boolean,
    binary: boolean,
  ): void {
    this.data = computeMinMax(series, includeZero, binary);
    this.time = computeTimeRange(timeData);
  }

  get dataRange(): DataRange {
    return this.data;
  }

  get timeRange(): TimeRange {
    return this.time;
  }

  get innerWidth(): number {
    const { width, leftOffset, gridBorder } = this.layout;
    return width - leftOffset - gridBorder * 2;
  }

  get innerHeight(): number {
    const { height, bottomOffset, gridBorder } = this.layout;
    return height - bottomOffset - gridBorder * 2;
  }

  get width(): number {
    return this.layout.width;
  }

  get height(): number {
    return this.layout.height;
  }

  get leftOffset(): number {
    return this.layout.leftOffset;
  }

  get gridBorder(): number {
    return this.layout.gridBorder;
  }

  setWidth(width: number): void {
    this.layout = { ...this.layout, width };
  }

  setLeftOffset(leftOffset: number): void {
    this.layout = { ...this.layout, leftOffset };
  }

  private relativeToX(fraction: number): number {
    return this.innerWidth * fraction + this.layout.leftOffset + this.layout.gridBorder;
  }

  private relativeToY(fraction: number): number {
    return this.innerHeight * (1 - fraction) + this.layout.gridBorder;
  }

  computeX(t: number): number {
    const span = this.time.max - this.time.min;
    return this.relativeToX(span > 0 ? (t - this.time.min) / span : 0);
  }

  computeY(value: number): number {
    return this.relativeToY((value - this.data.min) / (this.data.max - this.data.min));
  }

  /** `[min, max]` SVG x coordinates of the plot area. */
  xRange(opts: CoordinateRange = 'inside-border'): [number, number] {
    const border = opts === 'outside-border' ? this.layout.gridBorder : 0;
    return [this.relativeToX(0) - border, this.relativeToX(1) + border];
  }

  /** `[bottom, top]` SVG y coordinates of the plot area. */
  yRange(opts: CoordinateRange = 'inside-border'): [number, number] {
    const border = opts === 'outside-border' ? this.layout.gridBorder : 0;
    return [this.relativeToY(0) + border, this.relativeToY(1) - border];
  }

  /** SVG x coordinate back to epoch seconds. */
  originalX(x: number): number {
    return this.toTime(x, this.time.min, this.time.max);
  }

  /** Index of the sample nearest to the SVG x coordinate. */
  offsetToTimeIndex(x: number, timeData: ReadonlyArray<number>): number {
    if (timeData.length === 0) return 0;
    const t = this.toTime(x, timeData[0], timeData[timeData.length - 1]);

    let index = partitionPoint(timeData, t);
    if (index > 0) {
      if (index >= timeData.length) return timeData.length - 1;
      if (t - timeData[index - 1] < timeData[index] - t) index -= 1;
    }
    return index;
  }

  private toTime(x: number, start: number, end: number): number {
    const fraction = (x - (this.layout.leftOffset + this.layout.gridBorder)) / this.innerWidth;
    return Math.trunc(fraction * (end - start)) + start;
  }
}

// first index whose value is >= t
function partitionPoint(sorted: ReadonlyArray<number>, t: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < t) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
