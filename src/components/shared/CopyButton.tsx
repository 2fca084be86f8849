import { createSignal, onCleanup } from 'solid-js';
import CopyIcon from 'lucide-solid/icons/copy';
import CheckIcon from 'lucide-solid/icons/check';
import { Button } from './Button';
import { copyToClipboard } from '@/utils/clipboard';
import { showError } from '@/utils/toast';

export function CopyButton(props: { text: string; label?: string; class?: string }) {
  const [copied, setCopied] = createSignal(false);
  let resetTimer: ReturnType<typeof setTimeout> | undefined;

  const copy = async () => {
    if (!(await copyToClipboard(props.text))) {
      showError('Copy failed', 'Could not access the clipboard.');
      return;
    }
    setCopied(true);
    clearTimeout(resetTimer);
    resetTimer = setTimeout(() => setCopied(false), 2000);
  };

  onCleanup(() => clearTimeout(resetTimer));

  return (
    <Button
      size="sm"
      class={props.class}
      icon={copied() ? <CheckIcon class="h-4 w-4" /> : <CopyIcon class="h-4 w-4" />}
      onClick={() => void copy()}
    >
      {copied() ? 'Copied' : (props.label ?? 'Copy')}
    </Button>
  );
}

export default CopyButton;
