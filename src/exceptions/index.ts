export * from './CheckerUnavailableError';
export * from './ConfigurationError';
export * from './InvalidPackageSetError';
export * from './PackageNotSupportedError';
