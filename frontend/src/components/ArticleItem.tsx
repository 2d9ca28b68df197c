import { useState } from 'react';
import type { ClassifiedArticle } from '@/interfaces/article';
import { truncateTitle } from '@/utils/articles';
import { formatPublishedAt } from '@/utils/time';

export default function ArticleItem({
  index,
  item,
  showTopics,
}: {
  index: number;
  item: ClassifiedArticle;
  showTopics: boolean;
}) {
  const [expanded, setExpanded] = useState(false);
  const { article, topics } = item;
  const published = formatPublishedAt(article.publishedAt);

  return (
    <div className="bg-slate-900 border border-slate-700 rounded-md">
      <button
        type="button"
        aria-expanded={expanded}
        onClick={() => setExpanded((v) => !v)}
        className="w-full text-left px-3 py-2 hover:bg-slate-800 transition flex items-start gap-2"
      >
        <span className="text-slate-500 text-xs pt-0.5">{expanded ? '▾' : '▸'}</span>
        <span className="flex-1 min-w-0">
          <span className="block text-sm font-semibold text-white">
            {index}. {truncateTitle(article.title)}
          </span>
          <span className="block text-xs text-slate-400">
            📌 {article.source} | 🕐 {published}
          </span>
        </span>
      </button>

      {expanded && (
        <div className="px-3 pb-3 pt-1 space-y-2 text-xs text-slate-300 border-t border-slate-700/60">
          {showTopics && (
            <div className="flex flex-wrap gap-1">
              {topics.map((topic) => (
                <span
                  key={topic}
                  className="px-2 py-0.5 rounded bg-slate-700/60 text-slate-200"
                >
                  {topic}
                </span>
              ))}
            </div>
          )}

          <p>
            <span className="text-slate-500">Source:</span> {article.source}
          </p>
          <p>
            <span className="text-slate-500">Published:</span> {published}
          </p>

          {article.url && (
            <a
              href={article.url}
              target="_blank"
              rel="noopener noreferrer"
              className="text-emerald-400 hover:underline"
            >
              Read full article
            </a>
          )}

          {article.description && <p className="text-slate-200">{article.description}</p>}
          {article.content && <p className="text-slate-400">{article.content}</p>}
        </div>
      )}
    </div>
  );
}
