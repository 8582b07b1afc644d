import pino, { BaseLogger } from 'pino';
import { safeConfigGet } from '../utils';

let _logger: BaseLogger | undefined;

export function createLogger(level?: string): BaseLogger {
  // stdout is reserved for the rewritten template.
  return pino(
    {
      name: 'pyfn-packager',
      level: level ?? safeConfigGet('logging.level', 'info'),
    },
    pino.destination(2),
  );
}

export function initialize(logger: BaseLogger) {
  _logger = logger;
}

export function getLogger(): BaseLogger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}
