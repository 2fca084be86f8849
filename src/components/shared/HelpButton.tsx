import { Show } from 'solid-js';
import FileTextIcon from 'lucide-solid/icons/file-text';
import { Button } from './Button';

export const DOCS_INDEX = '/docs/index.html';

/** Documentation link; a section anchor is appended when given. */
export function helpLink(section?: string): string {
  return section ? `${DOCS_INDEX}#${encodeURIComponent(section)}` : DOCS_INDEX;
}

export function HelpButton(props: { section?: string; class?: string }) {
  const open = () => {
    window.open(helpLink(props.section), 'top');
  };

  return (
    <Show
      when={props.section}
      fallback={
        <Button size="sm" class={props.class} aria-label="documentation" icon={<FileTextIcon class="h-4 w-4" />} onClick={open}>
          Documentation
        </Button>
      }
    >
      <Button size="icon" class={`rounded-full ${props.class ?? ''}`} aria-label="help" onClick={open}>
        ?
      </Button>
    </Show>
  );
}

export default HelpButton;
