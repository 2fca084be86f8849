import { For, Show, createMemo, createSignal } from 'solid-js';
import CircleIcon from 'lucide-solid/icons/circle';
import { GraphSpace } from '@/utils/rrd/graphSpace';
import type { GraphLayout } from '@/utils/rrd/graphSpace';
import { computeFillPath, computeOutlinePath } from '@/utils/rrd/series';
import type { Series } from '@/utils/rrd/series';
import { reduceFloatPrecision } from '@/utils/rrd/units';
import {
  formatRRDDateTime,
  formatRRDTime,
  sliceView,
  timeGridLines,
  valueGridLines,
  zoomViewRange,
} from '@/utils/rrd/view';
import type { ViewRange } from '@/utils/rrd/view';

const SERIES_COLORS = [
  { stroke: 'stroke-blue-600', fill: 'fill-blue-500/20', marker: 'text-blue-600' },
  { stroke: 'stroke-emerald-600', fill: 'fill-emerald-500/20', marker: 'text-emerald-600' },
  { stroke: 'stroke-amber-600', fill: 'fill-amber-500/20', marker: 'text-amber-600' },
  { stroke: 'stroke-purple-600', fill: 'fill-purple-500/20', marker: 'text-purple-600' },
];

const colorOf = (index: number) => SERIES_COLORS[index % SERIES_COLORS.length];

export interface RRDGraphProps {
  title?: string;
  /** Sample times in epoch seconds, ascending. */
  timeData: readonly number[];
  series: readonly Series[];
  /** Always include zero in the value range (default true). */
  includeZero?: boolean;
  /** Use powers of two for the value grid, e.g. for byte counts. */
  binary?: boolean;
  layout?: Partial<GraphLayout>;
  class?: string;
}

/**
 * SVG line graph of RRD series. Drag over more than ten samples to zoom,
 * double-click to reset; the legend toggles series.
 */
export function RRDGraph(props: RRDGraphProps) {
  const [hidden, setHidden] = createSignal<ReadonlySet<number>>(new Set());
  const [viewRange, setViewRange] = createSignal<ViewRange | null>(null);
  const [selection, setSelection] = createSignal<{ start: number; end: number } | null>(null);
  const [pointer, setPointer] = createSignal<{ x: number; y: number } | null>(null);

  const visible = (index: number) => !hidden().has(index);

  const toggle = (index: number) => {
    const next = new Set(hidden());
    if (next.has(index)) next.delete(index);
    else next.add(index);
    setHidden(next);
  };

  const view = createMemo(() => {
    const data = sliceView(
      props.timeData,
      props.series.map((serie, index) => (visible(index) ? serie.data : [])),
      viewRange(),
    );
    const space = new GraphSpace(props.layout);
    space.update(data.time, data.series, props.includeZero ?? true, props.binary ?? false);
    return { ...data, space };
  });

  const indexAt = (x: number) => view().space.offsetToTimeIndex(x, view().time);

  const gridPath = createMemo(() => {
    const { space, time } = view();
    if (time.length === 0) return '';
    const [x0, x1] = space.xRange('outside-border');
    const [ymin, ymax] = space.yRange('outside-border');
    let path = '';
    for (const v of valueGridLines(space.dataRange)) {
      const y = space.computeY(v);
      path += `M ${x0.toFixed(1)} ${y.toFixed(1)} L ${x1.toFixed(1)} ${y.toFixed(1)}`;
    }
    for (const t of timeGridLines(space.timeRange)) {
      const x = space.computeX(t);
      path += `M ${x.toFixed(1)} ${ymin.toFixed(1)} L ${x.toFixed(1)} ${ymax.toFixed(1)}`;
    }
    return path;
  });

  const timeLabels = createMemo(() => {
    const { space, time } = view();
    if (time.length === 0) return [];
    let lastDate = '';
    return timeGridLines(space.timeRange).map((t) => {
      const { time: text, date } = formatRRDTime(t);
      const showDate = date !== lastDate;
      lastDate = date;
      return { x: space.computeX(t), text, date: showDate ? date : undefined };
    });
  });

  const hover = createMemo(() => {
    const current = pointer();
    const { time, series } = view();
    if (!current || time.length === 0) return null;
    const index = indexAt(current.x);
    return {
      index,
      time: time[index],
      values: series.map((data) => (index < data.length ? data[index] : undefined)),
    };
  });

  const selectionRect = () => {
    const current = selection();
    const { space, time } = view();
    if (!current || time.length === 0) return null;
    const a = space.computeX(time[Math.min(current.start, time.length - 1)]);
    const b = space.computeX(time[Math.min(current.end, time.length - 1)]);
    const [bottom, top] = space.yRange();
    return { x: Math.min(a, b), width: Math.abs(b - a), y: top, height: bottom - top };
  };

  const onPointerDown = (event: PointerEvent & { currentTarget: SVGSVGElement }) => {
    if (event.shiftKey) return;
    event.currentTarget.setPointerCapture?.(event.pointerId);
    const index = indexAt(event.offsetX);
    setSelection({ start: index, end: index });
  };

  const onPointerMove = (event: PointerEvent) => {
    setPointer({ x: event.offsetX, y: event.offsetY });
    const current = selection();
    if (current) setSelection({ start: current.start, end: indexAt(event.offsetX) });
  };

  const onPointerUp = (event: PointerEvent & { currentTarget: SVGSVGElement }) => {
    event.currentTarget.releasePointerCapture?.(event.pointerId);
    const current = selection();
    setSelection(null);
    if (current) setViewRange(zoomViewRange(viewRange(), current.start, indexAt(event.offsetX)));
  };

  const crossPath = () => {
    const current = pointer();
    if (!current) return '';
    const { space } = view();
    const [bottom] = space.yRange();
    const minX = space.leftOffset + space.gridBorder;
    const maxX = space.width - space.gridBorder;
    const x = Math.min(Math.max(current.x, minX), maxX);
    const y = Math.min(current.y, bottom);
    return `M ${x} 0 L ${x} ${bottom} M ${minX} ${y} L ${maxX} ${y}`;
  };

  return (
    <section class={`rounded-md border border-gray-200 dark:border-gray-700 ${props.class ?? ''}`.trim()}>
      <header class="flex items-center gap-2 border-b border-gray-200 px-3 py-1.5 text-sm dark:border-gray-700">
        <span class="flex-1 font-semibold">{props.title}</span>
        <Show when={props.series.length > 1}>
          <For each={props.series}>
            {(serie, index) => (
              <button
                type="button"
                class={`inline-flex items-center gap-1 rounded px-1.5 py-0.5 text-xs hover:bg-gray-100 dark:hover:bg-gray-800 ${
                  visible(index()) ? '' : 'opacity-50'
                }`}
                aria-pressed={visible(index()) ? 'true' : 'false'}
                onClick={() => toggle(index())}
              >
                <CircleIcon class={`h-3 w-3 fill-current ${colorOf(index()).marker}`} />
                {serie.label}
              </button>
            )}
          </For>
        </Show>
      </header>
      <div class="relative">
        <svg
          class="select-none text-gray-500"
          width={view().space.width}
          height={view().space.height}
          role="img"
          aria-label={props.title}
          onDblClick={() => setViewRange(null)}
          onPointerLeave={() => setPointer(null)}
          onPointerDown={onPointerDown}
          onPointerMove={onPointerMove}
          onPointerUp={onPointerUp}
        >
          <path class="stroke-gray-200 dark:stroke-gray-700" fill="none" d={gridPath()} />
          <For each={valueGridLines(view().space.dataRange)}>
            {(v) => (
              <text
                class="fill-current text-[10px]"
                x={view().space.xRange('outside-border')[0]}
                y={view().space.computeY(v)}
                dx="-4"
                dy="4"
                text-anchor="end"
              >
                {String(reduceFloatPrecision(v))}
              </text>
            )}
          </For>
          <For each={timeLabels()}>
            {(label) => {
              const y = () => view().space.yRange('outside-border')[0];
              return (
                <>
                  <text class="fill-current text-[10px]" x={label.x} y={y()} dy="10" text-anchor="middle">
                    {label.text}
                  </text>
                  <Show when={label.date}>
                    {(date) => (
                      <text class="fill-current text-[10px]" x={label.x} y={y()} dy="26" text-anchor="middle">
                        {date()}
                      </text>
                    )}
                  </Show>
                </>
              );
            }}
          </For>
          <For each={view().series}>
            {(data, index) => (
              <Show when={visible(index()) && data.length > 0}>
                <path
                  class={colorOf(index()).fill}
                  stroke="none"
                  d={computeFillPath(
                    view().time,
                    data,
                    view().space.dataRange.min,
                    view().space.dataRange.max,
                    (t) => view().space.computeX(t),
                    (v) => view().space.computeY(v),
                  )}
                />
                <path
                  class={colorOf(index()).stroke}
                  fill="none"
                  stroke-width="1.5"
                  d={computeOutlinePath(
                    view().time,
                    data,
                    (t) => view().space.computeX(t),
                    (v) => view().space.computeY(v),
                  )}
                />
              </Show>
            )}
          </For>
          <Show when={selectionRect()}>
            {(rect) => (
              <rect class="fill-blue-500/20 stroke-blue-500" x={rect().x} y={rect().y} width={rect().width} height={rect().height} />
            )}
          </Show>
          <Show when={hover()}>
            {(current) => (
              <For each={current().values}>
                {(value, index) => (
                  <Show when={value !== undefined && Number.isFinite(value)}>
                    <circle
                      class={colorOf(index()).stroke}
                      fill="none"
                      cx={view().space.computeX(current().time)}
                      cy={view().space.computeY(value ?? 0)}
                      r="5"
                    />
                  </Show>
                )}
              </For>
            )}
          </Show>
          <path class="stroke-gray-400" stroke-dasharray="2 2" fill="none" d={crossPath()} />
        </svg>
        <Show when={hover()}>
          {(current) => (
            <div
              role="tooltip"
              aria-live="polite"
              class="pointer-events-none absolute z-10 rounded border border-gray-200 bg-white px-2 py-1 text-xs shadow dark:border-gray-700 dark:bg-gray-800"
              style={{ left: `${(pointer()?.x ?? 0) + 20}px`, top: `${(pointer()?.y ?? 0) + 20}px` }}
            >
              <For each={props.series}>
                {(serie, index) => (
                  <Show when={visible(index())}>
                    <div>{`${serie.label}: ${formatTooltipValue(current().values[index()])}`}</div>
                  </Show>
                )}
              </For>
              <div>{formatRRDDateTime(current().time)}</div>
            </div>
          )}
        </Show>
      </div>
    </section>
  );
}

export function formatTooltipValue(value: number | undefined): string {
  return value === undefined || Number.isNaN(value) ? '-' : String(reduceFloatPrecision(value));
}

export default RRDGraph;
