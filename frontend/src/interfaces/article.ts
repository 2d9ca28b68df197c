/**
 * Article as delivered by the gateway's `/search`
 */
export interface Article {
  title: string;
  source: string;
  publishedAt: string;
  url: string;
  description?: string;
  content?: string;
}

export interface SearchParams {
  q: string;
  from: string;
  to: string;
  limit: number;
  domains?: string;
}

export interface SearchFormValues {
  query: string;
  from: string;
  to: string;
  domains: string;
  limit: number;
}

export interface ClassifiedArticle {
  article: Article;
  topics: string[];
}

export interface TopicGroup {
  topic: string;
  items: ClassifiedArticle[];
}
