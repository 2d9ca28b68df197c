import { useMemo } from 'react';
import ArticleItem from './ArticleItem';
import type { Article } from '@/interfaces/article';
import { topicClassifier, TopicClassifier } from '@/modules/topicClassifier';
import { classifyArticles, filterByTopics, groupByTopic } from '@/utils/articles';

export default function ArticleResults({
  articles,
  selectedTopics,
  grouped,
  showTopics,
  classifier = topicClassifier,
}: {
  articles: Article[];
  selectedTopics: string[];
  grouped: boolean;
  showTopics: boolean;
  classifier?: TopicClassifier;
}) {
  const visible = useMemo(
    () => filterByTopics(classifyArticles(articles, classifier), selectedTopics),
    [articles, classifier, selectedTopics]
  );

  if (visible.length === 0) {
    return (
      <p className="text-sm text-slate-400">No articles match the selected topics.</p>
    );
  }

  if (grouped) {
    return (
      <div className="space-y-4">
        {groupByTopic(visible, selectedTopics).map((group) => (
          <section key={group.topic} aria-label={group.topic} className="space-y-2">
            <h4 className="text-sm font-semibold text-emerald-400">
              {group.topic} ({group.items.length})
            </h4>
            {group.items.map((item, i) => (
              <ArticleItem
                key={`${group.topic}-${item.article.url}-${i}`}
                index={i + 1}
                item={item}
                showTopics={showTopics}
              />
            ))}
          </section>
        ))}
      </div>
    );
  }

  return (
    <div className="space-y-2">
      {visible.map((item, i) => (
        <ArticleItem
          key={`${item.article.url}-${i}`}
          index={i + 1}
          item={item}
          showTopics={showTopics}
        />
      ))}
    </div>
  );
}
