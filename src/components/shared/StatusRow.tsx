import type { JSX } from 'solid-js';

export function StatusRow(props: { title: string; icon?: JSX.Element; status: JSX.Element; class?: string }) {
  return (
    <div class={`flex items-center justify-between gap-4 text-sm ${props.class ?? ''}`.trim()}>
      <span class="inline-flex items-center gap-1.5 text-gray-700 dark:text-gray-300">
        {props.icon}
        {props.title}
      </span>
      <span class="text-right text-gray-900 dark:text-gray-100">{props.status}</span>
    </div>
  );
}

export default StatusRow;
