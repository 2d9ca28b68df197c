import { useCallback, useState } from 'react';
import { searchArticles } from '@/api/gateway';
import type { Article, SearchParams } from '@/interfaces/article';

export type SearchState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'error'; message: string }
  | {
      status: 'success';
      totalResults: number;
      articles: Article[];
      from: string;
      to: string;
    };

export function useArticleSearch() {
  const [state, setState] = useState<SearchState>({ status: 'idle' });

  const search = useCallback(async (baseUrl: string, params: SearchParams) => {
    setState({ status: 'loading' });

    const outcome = await searchArticles(baseUrl, params);

    if (outcome.kind === 'success') {
      setState({
        status: 'success',
        totalResults: outcome.totalResults,
        articles: outcome.articles,
        from: params.from,
        to: params.to,
      });
    } else {
      setState({ status: 'error', message: outcome.message });
    }
  }, []);

  // Local validation failures share the error banner
  const fail = useCallback((message: string) => {
    setState({ status: 'error', message });
  }, []);

  return { state, search, fail };
}
