// Tailwind class strings shared by form fields

const join = (base: string, extra?: string) => (extra ? `${base} ${extra}`.trim() : base);

export const formField = 'flex flex-col gap-1';
export const formLabel = 'text-xs font-medium text-gray-700 dark:text-gray-300';
export const formHelpText = 'text-xs text-gray-500 dark:text-gray-400';
export const formErrorText = 'text-xs text-red-600 dark:text-red-400';

export const formControl = [
  'w-full rounded-md border border-gray-300 bg-white px-2.5 py-1.5 text-sm text-gray-900 shadow-sm',
  'focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-blue-500',
  'disabled:bg-gray-100 disabled:text-gray-500',
  'dark:border-gray-600 dark:bg-gray-800 dark:text-gray-100',
].join(' ');

export const formControlInvalid = join(formControl, 'border-red-500 focus:ring-red-500');
export const formControlMono = join(formControl, 'font-mono');
export const formSelect = join(formControl, 'pr-8');
export const formTextarea = join(formControl, 'min-h-[96px] resize-y');
export const formCheckbox =
  'rounded border-gray-300 text-blue-600 focus:ring-blue-500 dark:border-gray-600 dark:bg-gray-800';

/** Two column layout used by edit windows. */
export const inputPanel = 'grid grid-cols-1 gap-x-6 gap-y-3 p-4 sm:grid-cols-2';
export const inputPanelWide = 'sm:col-span-2';

export function controlClass(invalid: boolean, extra?: string) {
  return join(invalid ? formControlInvalid : formControl, extra);
}
