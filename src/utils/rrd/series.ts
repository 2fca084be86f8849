// SVG path builders for RRD series; NaN marks a missing sample

export interface Series {
  label: string;
  data: number[];
}

type MapX = (t: number) => number;
type MapY = (value: number) => number;

const point = (x: number, y: number) => `${x.toFixed(1)} ${y.toFixed(1)}`;

const valueAt = (values: ReadonlyArray<number>, i: number) => (i < values.length ? values[i] : NaN);

/** Line through the samples; gaps are left open. */
export function computeOutlinePath(
  timeData: ReadonlyArray<number>,
  values: ReadonlyArray<number>,
  computeX: MapX,
  computeY: MapY,
): string {
  let path = '';
  let lastUndefined = true;

  timeData.forEach((t, i) => {
    const value = valueAt(values, i);
    if (Number.isNaN(value)) {
      lastUndefined = true;
      return;
    }
    path += ` ${lastUndefined ? 'M' : 'L'} ${point(computeX(t), computeY(value))}`;
    lastUndefined = false;
  });

  return path;
}

/** Area between the samples and the zero line (or the nearest axis bound). */
export function computeFillPath(
  timeData: ReadonlyArray<number>,
  values: ReadonlyArray<number>,
  minData: number,
  maxData: number,
  computeX: MapX,
  computeY: MapY,
): string {
  let y0 = computeY(0);
  if (minData > 0) y0 = computeY(minData);
  if (maxData < 0) y0 = computeY(maxData);

  let path = '';
  let lastUndefined = true;

  for (let i = 0; i < timeData.length; i++) {
    const value = valueAt(values, i);
    const x = computeX(timeData[i]);

    if (lastUndefined) {
      if (Number.isNaN(value)) continue;
      lastUndefined = false;
      path += ` M ${point(x, y0)}`;
    } else if (Number.isNaN(value)) {
      lastUndefined = true;
      const prevX = i > 0 ? computeX(timeData[i - 1]) : x;
      path += ` L ${point(prevX, y0)}`;
      continue;
    }
    path += ` L ${point(x, computeY(value))}`;
  }

  if (timeData.length > 0 && !lastUndefined) {
    path += ` L ${point(computeX(timeData[timeData.length - 1]), y0)}`;
  }

  return path;
}
