import { createMemo } from 'solid-js';
import { renderMarkdown } from '@/utils/markdown';

/** Sanitized markdown rendering. */
export function Markdown(props: { text: string; class?: string }) {
  const html = createMemo(() => renderMarkdown(props.text));
  return <div class={`prose prose-sm max-w-none dark:prose-invert ${props.class ?? ''}`.trim()} innerHTML={html()} />;
}

export default Markdown;
