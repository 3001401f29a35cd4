export * from './config';
export * from './EmbeddingClient';
export * from './filters';
export * from './SearchQueryComposer';
export * from './RedisVectorStore';
export * from './articles';
export * from './SearchResultPresenter';
export * from './VectorSearchRecipe';
