#!/usr/bin/env node
import { buildProgram } from './index';
import { getLogger } from './logging';

// skipcq: JS-0098
void (async () => {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (err) {
    getLogger().fatal(
      { err },
      err instanceof Error ? err.message : 'Packaging failed.',
    );
    process.exitCode = 1;
  }
})();
