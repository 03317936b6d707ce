export * from './compatibility.interfaces';
export * from './priority.interfaces';
export * from './store.interfaces';
export * from './checker.interfaces';
export * from './badge.interfaces';
export * from './logger.interfaces';
