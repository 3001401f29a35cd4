export * from './config';
export * from './MessageComposer';
export * from './CompletionClient';
export * from './ImageClassifier';
export * from './ClassificationReportPresenter';
export * from './completionPipeline';
