import { For, Show, createEffect, onCleanup } from 'solid-js';
import type { JSX } from 'solid-js';
import type { FormContext } from './formContext';
import {
  controlClass,
  formCheckbox,
  formErrorText,
  formField,
  formHelpText,
  formLabel,
  formSelect,
  formTextarea,
  inputPanelWide,
} from './Form';

export interface FieldBaseProps {
  form: FormContext;
  name: string;
  label: JSX.Element;
  help?: JSX.Element;
  disabled?: boolean;
  /** Span both columns of the input panel. */
  wide?: boolean;
  /** Only shown when the advanced checkbox is set. */
  advanced?: boolean;
}

let fieldSeq = 0;
export const nextFieldId = (name: string) => `field-${name}-${++fieldSeq}`;

/**
 * Keep the form's error for `name` in sync with `check`. Hidden and disabled
 * fields never block the submit button.
 */
export function useFieldValidation(props: FieldBaseProps, check: () => string | null) {
  createEffect(() => {
    const hidden = props.advanced && !props.form.advanced();
    props.form.setError(props.name, hidden || props.disabled ? null : check());
  });
  onCleanup(() => props.form.setError(props.name, null));
}

export function FieldShell(props: FieldBaseProps & { id: string; children: JSX.Element }) {
  return (
    <Show when={!props.advanced || props.form.advanced()}>
      <div class={`${formField} ${props.wide ? inputPanelWide : ''}`.trim()}>
        <label for={props.id} class={formLabel}>
          {props.label}
        </label>
        {props.children}
        <Show when={props.form.error(props.name)}>
          {(message) => <span class={formErrorText}>{message()}</span>}
        </Show>
        <Show when={props.help}>
          <span class={formHelpText}>{props.help}</span>
        </Show>
      </div>
    </Show>
  );
}

export interface TextFieldProps extends FieldBaseProps {
  type?: 'text' | 'password' | 'email' | 'url' | 'date' | 'datetime-local';
  placeholder?: string;
  required?: boolean;
  autofocus?: boolean;
  mono?: boolean;
  validate?: (value: string) => string | null;
  trailing?: JSX.Element;
  /** Values offered in a drop-down; any text is accepted. */
  suggestions?: readonly string[];
}

export const requiredCheck = (required: boolean | undefined, value: string) =>
  required && !value.trim() ? 'This field is required.' : null;

export function TextField(props: TextFieldProps) {
  const id = nextFieldId(props.name);
  useFieldValidation(props, () => {
    const value = props.form.text(props.name);
    return requiredCheck(props.required, value) ?? (value && props.validate ? props.validate(value) : null);
  });

  return (
    <FieldShell {...props} id={id}>
      <div class="flex items-center gap-2">
        <input
          id={id}
          name={props.name}
          type={props.type ?? 'text'}
          class={controlClass(props.form.error(props.name) !== null, props.mono ? 'font-mono' : undefined)}
          value={props.form.text(props.name)}
          placeholder={props.placeholder}
          disabled={props.disabled}
          autofocus={props.autofocus}
          autocomplete={props.type === 'password' ? 'new-password' : 'off'}
          list={props.suggestions ? `${id}-list` : undefined}
          onInput={(event) => props.form.set(props.name, event.currentTarget.value)}
        />
        <Show when={props.suggestions}>
          {(items) => (
            <datalist id={`${id}-list`}>
              <For each={items()}>{(item) => <option value={item} />}</For>
            </datalist>
          )}
        </Show>
        {props.trailing}
      </div>
    </FieldShell>
  );
}

export interface NumberFieldProps extends FieldBaseProps {
  min?: number;
  max?: number;
  placeholder?: string;
  required?: boolean;
}

/** Numeric input; the value is kept as text and checked against min/max. */
export function NumberField(props: NumberFieldProps) {
  const id = nextFieldId(props.name);
  useFieldValidation(props, () => {
    const value = props.form.text(props.name);
    const missing = requiredCheck(props.required, value);
    if (missing || !value) return missing;
    const num = Number(value);
    if (!Number.isFinite(num)) return 'Invalid number.';
    if (props.min !== undefined && num < props.min) return `Minimum value is ${props.min}.`;
    if (props.max !== undefined && num > props.max) return `Maximum value is ${props.max}.`;
    return null;
  });

  return (
    <FieldShell {...props} id={id}>
      <input
        id={id}
        name={props.name}
        type="number"
        min={props.min}
        max={props.max}
        class={controlClass(props.form.error(props.name) !== null)}
        value={props.form.text(props.name)}
        placeholder={props.placeholder}
        disabled={props.disabled}
        onInput={(event) => props.form.set(props.name, event.currentTarget.value)}
      />
    </FieldShell>
  );
}

export interface TextAreaFieldProps extends FieldBaseProps {
  placeholder?: string;
  required?: boolean;
  mono?: boolean;
  rows?: number;
}

export function TextAreaField(props: TextAreaFieldProps) {
  const id = nextFieldId(props.name);
  useFieldValidation(props, () => requiredCheck(props.required, props.form.text(props.name)));

  return (
    <FieldShell {...props} id={id}>
      <textarea
        id={id}
        name={props.name}
        rows={props.rows ?? 4}
        class={`${formTextarea} ${props.mono ? 'font-mono' : ''}`.trim()}
        value={props.form.text(props.name)}
        placeholder={props.placeholder}
        disabled={props.disabled}
        onInput={(event) => props.form.set(props.name, event.currentTarget.value)}
      />
    </FieldShell>
  );
}

export interface CheckboxFieldProps extends FieldBaseProps {
  default?: boolean;
}

export function CheckboxField(props: CheckboxFieldProps) {
  const id = nextFieldId(props.name);

  return (
    <Show when={!props.advanced || props.form.advanced()}>
      <div class={`flex items-center gap-2 ${props.wide ? inputPanelWide : ''}`.trim()}>
        <input
          id={id}
          name={props.name}
          type="checkbox"
          class={formCheckbox}
          checked={props.form.checked(props.name, props.default)}
          disabled={props.disabled}
          onChange={(event) => props.form.set(props.name, event.currentTarget.checked)}
        />
        <label for={id} class={formLabel}>
          {props.label}
        </label>
      </div>
    </Show>
  );
}

export interface SelectOption {
  value: string;
  label: string;
}

export interface SelectFieldProps extends FieldBaseProps {
  options: readonly SelectOption[];
  required?: boolean;
  /** Text of an empty first entry; omitted when not set. */
  emptyText?: string;
}

export function SelectField(props: SelectFieldProps) {
  const id = nextFieldId(props.name);
  useFieldValidation(props, () => requiredCheck(props.required, props.form.text(props.name)));

  return (
    <FieldShell {...props} id={id}>
      <select
        id={id}
        name={props.name}
        class={formSelect}
        disabled={props.disabled}
        value={props.form.text(props.name)}
        onChange={(event) => props.form.set(props.name, event.currentTarget.value)}
      >
        <Show when={props.emptyText !== undefined}>
          <option value="">{props.emptyText}</option>
        </Show>
        <For each={props.options}>
          {(option) => (
            <option value={option.value} selected={option.value === props.form.text(props.name)}>
              {option.label}
            </option>
          )}
        </For>
      </select>
    </FieldShell>
  );
}

/** Read-only value shown with a label. */
export function DisplayField(props: { label: JSX.Element; value: JSX.Element; wide?: boolean }) {
  return (
    <div class={`${formField} ${props.wide ? inputPanelWide : ''}`.trim()}>
      <span class={formLabel}>{props.label}</span>
      <span class="text-sm text-gray-900 dark:text-gray-100 break-all">{props.value}</span>
    </div>
  );
}
