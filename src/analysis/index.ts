export * from './activity.computer';
export * from './chat-analyser';
export * from './frequency.computer';
export * from './message-filters';
export * from './report.computer';
export * from './time-series.generator';
export * from './user-stats.computer';
