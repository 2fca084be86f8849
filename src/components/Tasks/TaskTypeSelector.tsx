import { For } from 'solid-js';
import { formControl } from '@/components/shared/Form';
import { formatTaskDescription, registeredTaskTypes } from '@/utils/taskDescriptions';

let listSeq = 0;

/** Free text input suggesting the registered task types. */
export function TaskTypeSelector(props: { id?: string; value: string; onChange: (value: string) => void }) {
  const listId = `task-types-${++listSeq}`;
  const types = registeredTaskTypes().sort();

  return (
    <>
      <input
        id={props.id}
        class={formControl}
        list={listId}
        value={props.value}
        onInput={(event) => props.onChange(event.currentTarget.value)}
      />
      <datalist id={listId}>
        <For each={types}>{(type) => <option value={type}>{formatTaskDescription(type)}</option>}</For>
      </datalist>
    </>
  );
}

export default TaskTypeSelector;
