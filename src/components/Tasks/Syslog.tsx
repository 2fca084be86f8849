import { createSignal } from 'solid-js';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { Button } from '@/components/shared/Button';
import { formControl, formLabel } from '@/components/shared/Form';
import { epochToInputValue, inputValueToEpoch } from '@/utils/format';
import { LogView } from './LogView';

export interface SyslogProps {
  url?: string;
  service?: string;
}

/** System log with a since/until range; the default range is the last day. */
export function Syslog(props: SyslogProps) {
  const now = Math.floor(Date.now() / 1000);
  const [since, setSince] = createSignal(epochToInputValue(now - 24 * 3600));
  const [until, setUntil] = createSignal('');
  const [range, setRange] = createSignal<{ since?: number; until?: number }>({ since: now - 24 * 3600 });

  const apply = () => {
    setRange({ since: inputValueToEpoch(since()) ?? undefined, until: inputValueToEpoch(until()) ?? undefined });
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <label class={formLabel} for="syslog-since">Since:</label>
        <input id="syslog-since" type="datetime-local" class={`${formControl} w-auto`} value={since()} onInput={(e) => setSince(e.currentTarget.value)} />
        <label class={formLabel} for="syslog-until">Until:</label>
        <input id="syslog-until" type="datetime-local" class={`${formControl} w-auto`} value={until()} onInput={(e) => setUntil(e.currentTarget.value)} />
        <ToolbarSpacer />
        <Button size="sm" variant="primary" onClick={apply}>
          Update
        </Button>
      </Toolbar>
      <LogView
        class="min-h-0 flex-1"
        url={props.url ?? '/nodes/localhost/syslog'}
        service={props.service}
        since={range().since}
        until={range().until}
        active={range().until === undefined}
      />
    </div>
  );
}

export default Syslog;
