type ChecklistOption<T extends string> = {
  value: T;
  label: string;
};

type ChecklistFieldProps<T extends string> = {
  id: string;
  label: string;
  options: ChecklistOption<T>[];
  selected: T[];
  onChange: (next: T[]) => void;
};

const ChecklistField = <T extends string>({ id, label, options, selected, onChange }: ChecklistFieldProps<T>) => {
  // keep the option order whatever order boxes were ticked in
  const toggle = (value: T, enabled: boolean) => {
    const next = new Set(selected);
    if (enabled) {
      next.add(value);
    } else {
      next.delete(value);
    }
    onChange(options.map((option) => option.value).filter((optionValue) => next.has(optionValue)));
  };

  return (
    <fieldset className="checklist-field" id={id}>
      <legend className="field-label">{label}</legend>
      <div className="checklist-actions">
        <button
          type="button"
          className="secondary-button"
          onClick={() => onChange(options.map((option) => option.value))}
          disabled={selected.length === options.length}
        >
          Select all
        </button>
        <button
          type="button"
          className="secondary-button"
          onClick={() => onChange([])}
          disabled={selected.length === 0}
        >
          Clear
        </button>
      </div>
      <div className="checklist-options">
        {options.map((option) => (
          <label key={option.value} className="checklist-option">
            <input
              type="checkbox"
              checked={selected.includes(option.value)}
              onChange={(event) => toggle(option.value, event.target.checked)}
            />
            <span>{option.label}</span>
          </label>
        ))}
      </div>
    </fieldset>
  );
};

export default ChecklistField;
