import { For } from 'solid-js';
import {
  BANDWIDTH_UNITS,
  formatHumanByte,
  humanByteFromBytes,
  parseHumanByte,
  tryParseHumanByte,
  type HumanByte,
  type SizeUnit,
} from '@/utils/humanByte';
import { errorMessage } from '@/utils/errorHandler';
import { controlClass, formSelect } from './Form';
import { FieldShell, nextFieldId, requiredCheck, useFieldValidation, type FieldBaseProps } from './FormFields';

export interface BandwidthSelectorProps extends FieldBaseProps {
  required?: boolean;
  /** Shown while empty; a number is a byte count. */
  default?: HumanByte | number;
  /** Unit used until one is chosen. Defaults to MiB. */
  defaultUnit?: SizeUnit;
}

const toHumanByte = (value: HumanByte | number | undefined) =>
  typeof value === 'number' ? humanByteFromBytes(value) : value;

/**
 * Size with a unit selector. The form value is the text `<size><unit>`;
 * a numeric value is read as bytes.
 */
export function BandwidthSelector(props: BandwidthSelectorProps) {
  const id = nextFieldId(props.name);

  const current = (): HumanByte | null => {
    const raw = props.form.values[props.name];
    if (typeof raw === 'number') return humanByteFromBytes(raw);
    return tryParseHumanByte(props.form.text(props.name));
  };
  const fallback = () => toHumanByte(props.default);
  const unit = () => current()?.unit ?? fallback()?.unit ?? props.defaultUnit ?? 'MiB';

  useFieldValidation(props, () => {
    const raw = props.form.values[props.name];
    if (typeof raw === 'number') return null;
    const value = props.form.text(props.name);
    const missing = requiredCheck(props.required, value);
    if (missing || !value.trim()) return missing;
    try {
      parseHumanByte(value);
      return null;
    } catch (err) {
      return `unable to parse value: ${errorMessage(err)}`;
    }
  });

  const setSize = (text: string) => {
    props.form.set(props.name, text.trim() ? `${text.trim()}${unit()}` : '');
  };

  const setUnit = (next: SizeUnit) => {
    props.form.set(props.name, formatHumanByte({ size: current()?.size ?? 0, unit: next }));
  };

  return (
    <FieldShell {...props} id={id}>
      <div class="flex items-center gap-2">
        <input
          id={id}
          name={props.name}
          type="number"
          min={0}
          step="any"
          class={controlClass(props.form.error(props.name) !== null)}
          value={current()?.size ?? ''}
          placeholder={fallback()?.size.toString()}
          disabled={props.disabled}
          onInput={(event) => setSize(event.currentTarget.value)}
        />
        <select
          aria-label="Unit"
          class={`${formSelect} w-24`}
          disabled={props.disabled}
          value={unit()}
          onChange={(event) => {
            const next = BANDWIDTH_UNITS.find((candidate) => candidate === event.currentTarget.value);
            if (next) setUnit(next);
          }}
        >
          <For each={BANDWIDTH_UNITS}>
            {(candidate) => (
              <option value={candidate} selected={candidate === unit()}>
                {candidate}
              </option>
            )}
          </For>
        </select>
      </div>
    </FieldShell>
  );
}

export default BandwidthSelector;
