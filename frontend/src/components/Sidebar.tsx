import { EXAMPLE_QUERIES, SEARCH_TIPS } from '@/config';

export default function Sidebar({
  gatewayUrl,
  editable,
  onGatewayUrlChange,
}: {
  gatewayUrl: string;
  editable: boolean;
  onGatewayUrlChange: (value: string) => void;
}) {
  return (
    <aside className="w-full md:w-64 shrink-0 bg-slate-900 border border-slate-700 rounded-lg p-4 space-y-5 text-sm">
      {editable && (
        <div className="space-y-1">
          <label htmlFor="gateway-url" className="block text-xs font-medium text-slate-300">
            Backend URL
          </label>
          <input
            id="gateway-url"
            type="text"
            value={gatewayUrl}
            onChange={(e) => onGatewayUrlChange(e.target.value)}
            className="w-full rounded bg-slate-800 border border-slate-700 px-2 py-1 text-slate-100"
          />
          <p className="text-[11px] text-slate-500">Used only for local development</p>
        </div>
      )}

      <div>
        <h3 className="font-semibold text-slate-200 mb-1">Example Queries</h3>
        <ul className="space-y-1">
          {EXAMPLE_QUERIES.map((q) => (
            <li key={q}>
              <code className="text-xs text-emerald-400">{q}</code>
            </li>
          ))}
        </ul>
      </div>

      <div>
        <h3 className="font-semibold text-slate-200 mb-1">Tips</h3>
        <ul className="list-disc list-inside text-xs text-slate-400 space-y-1">
          {SEARCH_TIPS.map((tip) => (
            <li key={tip}>{tip}</li>
          ))}
        </ul>
      </div>
    </aside>
  );
}
