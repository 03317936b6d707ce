export * from './compatibility-checker.service';
export * from './memory-store.service';
export * from './sqlite-store.service';
