import { FormEvent, ReactNode, useState } from 'react';
import { DEFAULT_LIMIT, DEFAULT_QUERY, DEFAULT_RANGE_DAYS, MAX_LIMIT } from '@/config';
import type { SearchFormValues } from '@/interfaces/article';
import { defaultDateRange } from '@/utils/time';

function initialValues(): SearchFormValues {
  const { from, to } = defaultDateRange(new Date(), DEFAULT_RANGE_DAYS);
  return { query: DEFAULT_QUERY, from, to, domains: '', limit: DEFAULT_LIMIT };
}

export default function SearchForm({
  disabled,
  onSubmit,
}: {
  disabled: boolean;
  onSubmit: (values: SearchFormValues) => void;
}) {
  const [values, setValues] = useState<SearchFormValues>(initialValues);

  const update = <K extends keyof SearchFormValues>(key: K, value: SearchFormValues[K]) =>
    setValues((prev) => ({ ...prev, [key]: value }));

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    onSubmit(values);
  };

  return (
    <form onSubmit={handleSubmit} className="bg-slate-800 rounded-lg shadow-md p-4 space-y-4">
      <h2 className="text-lg font-semibold text-white">Search Parameters</h2>

      <fieldset disabled={disabled} className="grid grid-cols-1 md:grid-cols-2 gap-4">
        <Field id="query" label="Keyword Query" hint="Supports NewsAPI syntax: AND, OR, quotes for exact phrases">
          <input
            id="query"
            type="text"
            value={values.query}
            onChange={(e) => update('query', e.target.value)}
            className={inputClass}
          />
        </Field>

        <div className="grid grid-cols-2 gap-2">
          <Field id="from" label="From">
            <input
              id="from"
              type="date"
              value={values.from}
              onChange={(e) => update('from', e.target.value)}
              className={inputClass}
            />
          </Field>
          <Field id="to" label="To">
            <input
              id="to"
              type="date"
              value={values.to}
              onChange={(e) => update('to', e.target.value)}
              className={inputClass}
            />
          </Field>
        </div>

        <Field id="domains" label="Domains Filter (optional)" hint="Comma-separated list of domains to filter results">
          <input
            id="domains"
            type="text"
            value={values.domains}
            placeholder="kffhealthnews.org,reuters.com"
            onChange={(e) => update('domains', e.target.value)}
            className={inputClass}
          />
        </Field>

        <Field id="limit" label={`Number of Results: ${values.limit}`}>
          <input
            id="limit"
            type="range"
            min={1}
            max={MAX_LIMIT}
            value={values.limit}
            onChange={(e) => update('limit', Number(e.target.value))}
            className="w-full accent-emerald-500"
          />
        </Field>
      </fieldset>

      <button
        type="submit"
        disabled={disabled}
        className="px-4 py-2 rounded bg-emerald-600 hover:bg-emerald-500 text-white text-sm font-medium transition disabled:opacity-50"
      >
        {disabled ? 'Searching for articles…' : '🔍 Search'}
      </button>
    </form>
  );
}

const inputClass =
  'w-full rounded bg-slate-900 border border-slate-700 px-2 py-1 text-sm text-slate-100';

function Field({
  id,
  label,
  hint,
  children,
}: {
  id: string;
  label: string;
  hint?: string;
  children: ReactNode;
}) {
  return (
    <div className="space-y-1">
      <label htmlFor={id} className="block text-xs font-medium text-slate-300">
        {label}
      </label>
      {children}
      {hint && <p className="text-[11px] text-slate-500">{hint}</p>}
    </div>
  );
}
