import topicsData from '@/data/topics.json';

export const UNCATEGORIZED_TOPIC = 'Other/Uncategorized';

export interface TopicDefinition {
  name: string;
  keywords: readonly string[];
}

export type TopicTable = readonly TopicDefinition[];

export interface Classifiable {
  title?: string | null;
  description?: string | null;
}

export const DEFAULT_TOPIC_TABLE: TopicTable = topicsData.topics;

// "AI-driven care, now." -> "ai driven care now "
function normalize(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ');
}

/**
 * Keyword-based topic lookup.
 *
 * An article belongs to a topic when any of the topic's keywords occurs
 * in its title or description. Both sides are lower-cased and punctuation
 * becomes a space, so a padded keyword such as `" ai "` matches whole
 * words at either end of the text or next to punctuation. Topics come back in
 * table order; articles matching nothing get the single
 * `Other/Uncategorized` topic.
 */
export class TopicClassifier {
  private readonly table: TopicTable;

  constructor(table: TopicTable) {
    this.table = Object.freeze(
      table.map((topic) =>
        Object.freeze({
          name: topic.name,
          keywords: Object.freeze(topic.keywords.map(normalize)),
        })
      )
    );
  }

  classify(article: Classifiable): string[] {
    const text = ` ${normalize(`${article.title ?? ''} ${article.description ?? ''}`)} `;

    const topics = this.table
      .filter((topic) => topic.keywords.some((keyword) => text.includes(keyword)))
      .map((topic) => topic.name);

    return topics.length > 0 ? topics : [UNCATEGORIZED_TOPIC];
  }

  /** Every label classify() can return, in table order */
  topicNames(): string[] {
    return [...this.table.map((topic) => topic.name), UNCATEGORIZED_TOPIC];
  }
}

export const topicClassifier = new TopicClassifier(DEFAULT_TOPIC_TABLE);
