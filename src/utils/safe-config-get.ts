import config from 'config';

/**
 * Reads a configuration value, falling back when the key is absent. The CLI can
 * be started from any directory, in which case no configuration files are found.
 */
export function safeConfigGet<T>(key: string, defaultValue: T): T {
  return config.has(key) ? config.get<T>(key) : defaultValue;
}
