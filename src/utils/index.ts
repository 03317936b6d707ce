export * from '@U/logger.utils';
export * from '@U/config.utils';
export * from '@U/version.utils';
export * from '@U/store.utils';
export * from '@U/concurrency.utils';
export * from '@U/template.utils';
export * from '@U/priority-classifier.utils';
export * from '@U/compatibility-aggregator.utils';
export * from '@U/dependency-highlighter.utils';
export * from '@U/deprecated-dep-finder.utils';
export * from '@U/badge.utils';
export * from '@U/dashboard.utils';

// Export interfaces from the interfaces folder
export * from '@I/index';
