import { Show } from 'solid-js';
import type { JSX } from 'solid-js';

export type MeterLevel = 'good' | 'warning' | 'critical';

/**
 * Level of `value` like the HTML meter element computes it: the range the
 * optimum lies in is good, the adjacent range a warning, the far one critical.
 */
export function meterLevel(value: number, low: number, high: number, optimum: number): MeterLevel {
  const region = (v: number) => (v <= low ? 0 : v <= high ? 1 : 2);
  const distance = Math.abs(region(value) - region(optimum));
  return distance === 0 ? 'good' : distance === 1 ? 'warning' : 'critical';
}

const barColor: Record<MeterLevel, string> = {
  good: 'bg-green-500',
  warning: 'bg-yellow-500',
  critical: 'bg-red-500',
};

export interface MeterLabelProps {
  title: string;
  icon?: JSX.Element;
  /** Fraction 0..1 */
  value?: number;
  /** Text right of the title; defaults to the percentage. */
  status?: JSX.Element;
  low?: number;
  high?: number;
  optimum?: number;
}

export function MeterLabel(props: MeterLabelProps) {
  const level = () => meterLevel(props.value ?? 0, props.low ?? 0.75, props.high ?? 0.9, props.optimum ?? 0);
  const width = () => `${Math.min(100, Math.max(0, (props.value ?? 0) * 100))}%`;

  return (
    <div class="flex flex-col gap-1">
      <div class="flex items-center justify-between gap-2 text-sm">
        <span class="inline-flex items-center gap-1.5 text-gray-700 dark:text-gray-300">
          {props.icon}
          {props.title}
        </span>
        <span class="text-gray-900 dark:text-gray-100">
          {props.status ?? (props.value !== undefined ? `${(props.value * 100).toFixed(2)} %` : '')}
        </span>
      </div>
      <Show when={props.value !== undefined}>
        <div
          class="h-1.5 w-full overflow-hidden rounded bg-gray-200 dark:bg-gray-700"
          role="meter"
          aria-valuemin={0}
          aria-valuemax={1}
          aria-valuenow={props.value}
          aria-label={props.title}
          data-level={level()}
        >
          <div class={`h-full ${barColor[level()]}`} style={{ width: width() }} />
        </div>
      </Show>
    </div>
  );
}

export default MeterLabel;
