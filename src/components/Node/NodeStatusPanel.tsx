import { For, Match, Show, Switch, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import CpuIcon from 'lucide-solid/icons/cpu';
import ClockIcon from 'lucide-solid/icons/clock';
import MemoryStickIcon from 'lucide-solid/icons/memory-stick';
import ActivityIcon from 'lucide-solid/icons/activity';
import HardDriveIcon from 'lucide-solid/icons/hard-drive';
import ArrowLeftRightIcon from 'lucide-solid/icons/arrow-left-right';
import { NodeAPI } from '@/api/node';
import { Button, RefreshButton } from '@/components/shared/Button';
import { ConfirmButton } from '@/components/shared/ConfirmButton';
import { CopyButton } from '@/components/shared/CopyButton';
import { Dialog } from '@/components/shared/Dialog';
import { MeterLabel } from '@/components/shared/MeterLabel';
import { StatusRow } from '@/components/shared/StatusRow';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { NodePowerCommand } from '@/types/node';
import { nodeInfoRows } from '@/utils/nodeInfo';
import type { MeterRow, NodeInfoIcon, StatusRowInfo } from '@/utils/nodeInfo';
import { showSuccess } from '@/utils/toast';

export interface NodeStatusPanelProps {
  url?: string;
  /** Show the power and fingerprint buttons. */
  showActions?: boolean;
}

const ICONS: Record<NodeInfoIcon, (props: { class?: string }) => JSX.Element> = {
  cpu: CpuIcon,
  clock: ClockIcon,
  memory: MemoryStickIcon,
  load: ActivityIcon,
  disk: HardDriveIcon,
  swap: ArrowLeftRightIcon,
};

const rowIcon = (icon: NodeInfoIcon | undefined) => {
  if (!icon) return undefined;
  const Icon = ICONS[icon];
  return <Icon class="h-4 w-4" />;
};

/** Usage meters and system information of the node. */
export function NodeStatusPanel(props: NodeStatusPanelProps) {
  const status = useLoader(() => NodeAPI.status(props.url), { interval: POLLING_INTERVALS.RUNNING_TASKS });
  const [showFingerprint, setShowFingerprint] = createSignal(false);
  const alert = createAlert('NodeStatusPanel');

  const power = async (command: NodePowerCommand) => {
    try {
      await NodeAPI.power(command, props.url);
      showSuccess(command === 'reboot' ? 'Reboot initiated' : 'Shutdown initiated');
    } catch (err) {
      alert.show('Error', err);
    }
  };

  const asMeter = (row: MeterRow | StatusRowInfo) => (row.kind === 'meter' ? row : undefined);
  const asStatus = (row: MeterRow | StatusRowInfo) => (row.kind === 'status' ? row : undefined);

  return (
    <div class="flex flex-col">
      <Toolbar>
        <span class="text-sm font-medium text-gray-800 dark:text-gray-200">Node Status</span>
        <ToolbarSpacer />
        <Show when={props.showActions}>
          <ConfirmButton size="sm" confirmMessage="Are you sure you want to reboot the node?" onActivate={() => void power('reboot')}>
            Reboot
          </ConfirmButton>
          <ConfirmButton
            size="sm"
            confirmMessage="Are you sure you want to shut down the node?"
            onActivate={() => void power('shutdown')}
          >
            Shutdown
          </ConfirmButton>
          <Button size="sm" disabled={!status.data()?.info?.fingerprint} onClick={() => setShowFingerprint(true)}>
            Show Fingerprint
          </Button>
        </Show>
        <RefreshButton loading={status.loading()} onClick={() => void status.reload()} />
      </Toolbar>
      <Show when={status.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <div class="grid grid-cols-1 gap-x-8 gap-y-3 p-4 md:grid-cols-2">
        <For each={nodeInfoRows(status.data() ?? null)}>
          {(row) => (
            <Switch>
              <Match when={asMeter(row)}>
                {(meter) => (
                  <MeterLabel
                    title={meter().title}
                    icon={rowIcon(meter().icon)}
                    value={meter().value}
                    status={meter().status}
                    low={meter().low}
                    high={meter().high}
                    optimum={meter().optimum}
                  />
                )}
              </Match>
              <Match when={asStatus(row)}>
                {(info) => (
                  <StatusRow
                    class={info().wide ? 'md:col-span-2' : undefined}
                    title={info().title}
                    icon={rowIcon(info().icon)}
                    status={info().status}
                  />
                )}
              </Match>
            </Switch>
          )}
        </For>
      </div>
      <Show when={showFingerprint() && status.data()?.info?.fingerprint}>
        {(fingerprint) => (
          <Dialog
            isOpen
            title="Fingerprint"
            onClose={() => setShowFingerprint(false)}
            footer={
              <>
                <CopyButton text={fingerprint()} />
                <Button size="sm" variant="primary" onClick={() => setShowFingerprint(false)}>
                  OK
                </Button>
              </>
            }
          >
            <div class="p-4">
              <input readonly class="w-full rounded border border-gray-300 px-2 py-1 font-mono text-sm" value={fingerprint()} />
            </div>
          </Dialog>
        )}
      </Show>
      {alert.view()}
    </div>
  );
}

export default NodeStatusPanel;
