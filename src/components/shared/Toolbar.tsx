import type { JSX } from 'solid-js';

export function Toolbar(props: { children: JSX.Element; class?: string }) {
  return (
    <div
      role="toolbar"
      class={`flex flex-wrap items-center gap-2 border-b border-gray-200 bg-white px-2 py-1.5 dark:border-gray-700 dark:bg-gray-900 ${
        props.class ?? ''
      }`.trim()}
    >
      {props.children}
    </div>
  );
}

/** Pushes the following toolbar items to the right. */
export const ToolbarSpacer = () => <div class="flex-1" />;

export const ToolbarSeparator = () => <div class="mx-1 h-5 w-px bg-gray-200 dark:bg-gray-700" />;

export default Toolbar;
