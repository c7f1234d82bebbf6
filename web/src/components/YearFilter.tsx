interface YearFilterProps {
  years: readonly number[];
  selected: readonly number[];
  onToggle: (year: number) => void;
  onClear: () => void;
}

/**
 * Season pills; an empty selection means "all seasons"
 */
export function YearFilter({ years, selected, onToggle, onClear }: YearFilterProps) {
  if (years.length === 0) return null;

  return (
    <div className="flex flex-wrap items-center gap-2" role="group" aria-label="Seasons">
      <span className="text-xs uppercase text-slate-400">Seasons</span>
      {years.map((year) => {
        const active = selected.includes(year);
        return (
          <button
            key={year}
            type="button"
            aria-pressed={active}
            onClick={() => onToggle(year)}
            className={`rounded-full px-3 py-0.5 text-xs ${
              active ? "bg-orange-500 text-white" : "bg-slate-700 text-slate-300"
            }`}
          >
            {year}
          </button>
        );
      })}
      {selected.length > 0 && (
        <button type="button" onClick={onClear} className="text-xs text-slate-400 underline">
          Clear
        </button>
      )}
    </div>
  );
}
