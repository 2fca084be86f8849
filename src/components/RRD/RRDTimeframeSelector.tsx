import { For, onCleanup, onMount } from 'solid-js';
import { EVENTS } from '@/constants';
import {
  RRD_TIMEFRAMES,
  isRRDTimeframe,
  reloadRRDTimeframe,
  rrdTimeframe,
  setRRDTimeframe,
} from '@/stores/rrdTimeframe';
import type { RRDTimeframe } from '@/stores/rrdTimeframe';
import { formSelect } from '@/components/shared/Form';

export interface RRDTimeframeSelectorProps {
  /** Called after the user picked a timeframe. */
  onChange?: (value: RRDTimeframe) => void;
  class?: string;
}

/** Drop-down for the timeframe shared by all RRD graphs. */
export function RRDTimeframeSelector(props: RRDTimeframeSelectorProps) {
  // another selector on the page (or another tab) may change the stored value
  const sync = () => {
    reloadRRDTimeframe();
  };

  onMount(() => {
    document.addEventListener(EVENTS.RRD_TIMEFRAME_CHANGED, sync);
    window.addEventListener('storage', sync);
  });
  onCleanup(() => {
    document.removeEventListener(EVENTS.RRD_TIMEFRAME_CHANGED, sync);
    window.removeEventListener('storage', sync);
  });

  const select = (value: string) => {
    if (!isRRDTimeframe(value)) return;
    setRRDTimeframe(value);
    props.onChange?.(value);
  };

  return (
    <select
      aria-label="Timeframe"
      class={`${formSelect} w-auto ${props.class ?? ''}`.trim()}
      value={rrdTimeframe()}
      onChange={(event) => select(event.currentTarget.value)}
    >
      <For each={RRD_TIMEFRAMES}>
        {(info) => (
          <option value={info.value} selected={info.value === rrdTimeframe()}>
            {info.label}
          </option>
        )}
      </For>
    </select>
  );
}

export default RRDTimeframeSelector;
