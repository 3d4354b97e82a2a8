export * from './chat-export.parser';
export * from './line-classifier';
