import { useState } from "react";
import Header from "../components/Header";
import Sidebar from "../components/Sidebar";
import SearchForm from "../components/SearchForm";
import TopicFilter from "../components/TopicFilter";
import ArticleResults from "../components/ArticleResults";
import { useArticleSearch } from "../hooks/useArticleSearch";
import { useGatewayUrl } from "../hooks/useGatewayUrl";
import { topicClassifier } from "../modules/topicClassifier";
import type { SearchFormValues } from "../interfaces/article";
import { toSearchParams, validateSearchForm } from "../utils/search";

const SearchPage = () => {
    const { gatewayUrl, draft, editable, setDraft } = useGatewayUrl();
    const { state, search, fail } = useArticleSearch();

    const [selectedTopics, setSelectedTopics] = useState<string[]>([]);
    const [grouped, setGrouped] = useState(false);
    const [showTopics, setShowTopics] = useState(true);

    const handleSubmit = (values: SearchFormValues) => {
        const invalid = validateSearchForm(values, gatewayUrl);
        if (invalid) {
            fail(invalid);
            return;
        }
        void search(gatewayUrl, toSearchParams(values));
    };

    return (
        <div className="min-h-screen min-w-screen bg-neutral-800 text-slate-100">
            <Header />

            <div className="flex flex-col md:flex-row gap-4 p-4">
                <Sidebar
                    gatewayUrl={draft}
                    editable={editable}
                    onGatewayUrlChange={setDraft}
                />

                <main className="flex-1 min-w-0 space-y-4">
                    <SearchForm
                        disabled={state.status === "loading"}
                        onSubmit={handleSubmit}
                    />

                    <TopicFilter
                        topics={topicClassifier.topicNames()}
                        selected={selectedTopics}
                        groupByTopic={grouped}
                        showTopics={showTopics}
                        onSelectedChange={setSelectedTopics}
                        onGroupByTopicChange={setGrouped}
                        onShowTopicsChange={setShowTopics}
                    />

                    {state.status === "loading" && (
                        <div className="text-emerald-400 text-sm animate-pulse">
                            Searching for articles…
                        </div>
                    )}

                    {state.status === "error" && (
                        <div
                            role="alert"
                            className="rounded-md border border-rose-500/40 bg-rose-500/10 px-3 py-2 text-sm text-rose-300"
                        >
                            {state.message}
                        </div>
                    )}

                    {state.status === "success" && (
                        <section className="space-y-3">
                            <div className="rounded-md border border-emerald-500/40 bg-emerald-500/10 px-3 py-2 text-sm text-emerald-300">
                                <strong>Total Results Found: {state.totalResults.toLocaleString("en-US")}</strong>{" "}
                                (from {state.from} to {state.to})
                            </div>

                            {state.articles.length > 0 ? (
                                <>
                                    <h3 className="text-base font-semibold text-white">
                                        Showing {state.articles.length} article(s)
                                    </h3>
                                    <ArticleResults
                                        articles={state.articles}
                                        selectedTopics={selectedTopics}
                                        grouped={grouped}
                                        showTopics={showTopics}
                                    />
                                </>
                            ) : (
                                <p className="text-sm text-slate-400">
                                    No articles found for this query and date range.
                                </p>
                            )}
                        </section>
                    )}
                </main>
            </div>
        </div>
    );
};

export default SearchPage;
