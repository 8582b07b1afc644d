import { pathExists } from 'fs-extra';
import { readFile } from 'fs/promises';
import { dirname, isAbsolute, join, normalize } from 'path';
import { RuntimeTools } from './types/runtime-tools';
import { safeConfigGet } from '../../utils';

export const PYTHON_MANIFEST_FILES = ['Pipfile', 'requirements.txt'];

export const PYTHON_LOCK_FILES = ['Pipfile.lock'];

const REQUIREMENT_REFERENCE =
  /^\s*(?:-r|--requirement|-c|--constraint)(?:\s+|=)(\S+)/;

export const DEFAULT_SUPPORTED_RUNTIMES = [
  'python3.8',
  'python3.9',
  'python3.10',
  'python3.11',
  'python3.12',
];

export class PythonRuntimeTools implements RuntimeTools {
  readonly family = 'python';

  readonly supportedRuntimes: string[];

  constructor({ supportedRuntimes }: { supportedRuntimes?: string[] } = {}) {
    this.supportedRuntimes =
      supportedRuntimes ??
      safeConfigGet('runtimes.supported', DEFAULT_SUPPORTED_RUNTIMES);
  }

  isSupported(runtime: string): boolean {
    return this.supportedRuntimes.includes(runtime.toLowerCase());
  }

  interpreterVersion(runtime: string): string {
    return runtime.toLowerCase().replace(/^python/, '');
  }

  async findManifests(sourceDir: string): Promise<string[]> {
    const found: string[] = [];
    for (const name of PYTHON_MANIFEST_FILES) {
      if (await pathExists(join(sourceDir, name))) {
        found.push(name);
      }
    }
    return found;
  }

  async findSupportFiles(
    sourceDir: string,
    manifests: string[],
  ): Promise<string[]> {
    const found: string[] = [];
    for (const name of PYTHON_LOCK_FILES) {
      if (await pathExists(join(sourceDir, name))) {
        found.push(name);
      }
    }

    const visited = new Set(manifests);
    const pending = manifests.filter((name) => name.endsWith('.txt'));
    // Files pushed while iterating are visited too.
    for (const current of pending) {
      const contents = await readFile(join(sourceDir, current), 'utf8');
      for (const line of contents.split(/\r?\n/)) {
        const match = REQUIREMENT_REFERENCE.exec(line);
        if (!match) {
          continue;
        }
        const referenced = normalize(join(dirname(current), match[1]));
        if (
          visited.has(referenced) ||
          isAbsolute(match[1]) ||
          referenced.startsWith('..') ||
          !(await pathExists(join(sourceDir, referenced)))
        ) {
          continue;
        }
        visited.add(referenced);
        found.push(referenced);
        pending.push(referenced);
      }
    }
    return found;
  }
}
