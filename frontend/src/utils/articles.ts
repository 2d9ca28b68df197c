import type { Article, ClassifiedArticle, TopicGroup } from '@/interfaces/article';
import { topicClassifier, TopicClassifier } from '@/modules/topicClassifier';

export const TITLE_MAX_LENGTH = 90;

// Counts code points so an emoji is never split
export function truncateTitle(title: string, max = TITLE_MAX_LENGTH): string {
  const chars = Array.from(title);
  if (chars.length <= max) return title;
  return `${chars.slice(0, max - 1).join('').trimEnd()}…`;
}

export function classifyArticles(
  articles: Article[],
  classifier: TopicClassifier = topicClassifier
): ClassifiedArticle[] {
  return articles.map((article) => ({
    article,
    topics: classifier.classify(article),
  }));
}

/**
 * Keeps articles having at least one selected topic.
 * No selection means no filtering.
 */
export function filterByTopics(
  items: ClassifiedArticle[],
  selected: readonly string[]
): ClassifiedArticle[] {
  if (selected.length === 0) return items;
  const wanted = new Set(selected);
  return items.filter((item) => item.topics.some((topic) => wanted.has(topic)));
}

/**
 * Buckets articles by topic, alphabetically by topic name.
 * An article appears under every topic it has (only selected ones
 * when there is a selection); order inside a bucket is kept.
 */
export function groupByTopic(
  items: ClassifiedArticle[],
  selected: readonly string[]
): TopicGroup[] {
  const allowed = selected.length > 0 ? new Set(selected) : null;
  const buckets = new Map<string, ClassifiedArticle[]>();

  for (const item of items) {
    for (const topic of item.topics) {
      if (allowed && !allowed.has(topic)) continue;
      const bucket = buckets.get(topic);
      if (bucket) {
        bucket.push(item);
      } else {
        buckets.set(topic, [item]);
      }
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([topic, bucket]) => ({ topic, items: bucket }));
}
