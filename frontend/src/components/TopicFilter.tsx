export default function TopicFilter({
  topics,
  selected,
  groupByTopic,
  showTopics,
  onSelectedChange,
  onGroupByTopicChange,
  onShowTopicsChange,
}: {
  topics: string[];
  selected: string[];
  groupByTopic: boolean;
  showTopics: boolean;
  onSelectedChange: (selected: string[]) => void;
  onGroupByTopicChange: (value: boolean) => void;
  onShowTopicsChange: (value: boolean) => void;
}) {
  const toggle = (topic: string) => {
    onSelectedChange(
      selected.includes(topic)
        ? selected.filter((t) => t !== topic)
        : topics.filter((t) => t === topic || selected.includes(t))
    );
  };

  return (
    <div className="bg-slate-800 rounded-lg p-4 space-y-3">
      <div>
        <h3 className="text-sm font-semibold text-slate-200">Filter by topic</h3>
        <p className="text-[11px] text-slate-500">No selection shows all topics</p>
      </div>

      <div className="flex flex-wrap gap-1">
        {topics.map((topic) => {
          const active = selected.includes(topic);
          return (
            <button
              key={topic}
              type="button"
              aria-pressed={active}
              onClick={() => toggle(topic)}
              className={`px-2 py-1 text-xs rounded border transition ${
                active
                  ? 'bg-emerald-600/30 border-emerald-500 text-emerald-300'
                  : 'border-slate-700 text-slate-400 hover:text-white'
              }`}
            >
              {topic}
            </button>
          );
        })}
      </div>

      <div className="flex gap-4 text-xs text-slate-300">
        <label className="flex items-center gap-1">
          <input
            type="checkbox"
            checked={groupByTopic}
            onChange={(e) => onGroupByTopicChange(e.target.checked)}
          />
          Group by topic
        </label>
        <label className="flex items-center gap-1">
          <input
            type="checkbox"
            checked={showTopics}
            onChange={(e) => onShowTopicsChange(e.target.checked)}
          />
          Show topics
        </label>
      </div>
    </div>
  );
}
