export * from './generate-archive-name';
export * from './safe-config-get';
