import { RuntimeTools } from './types/runtime-tools';
import { PythonRuntimeTools } from './python';

export function runtimeFamily(runtime: string): string {
  const match = /^[a-z]+/.exec(runtime.toLowerCase());
  return match ? match[0] : '';
}

/**
 * Finds the tools able to build `runtime`. Returns undefined when the runtime
 * belongs to a language family this tool does not build, or to an unsupported
 * variant of one it does.
 */
export function getRuntimeTools(runtime: string): RuntimeTools | undefined {
  let tools: RuntimeTools;
  switch (runtimeFamily(runtime)) {
    case 'python':
      tools = new PythonRuntimeTools();
      break;
    default:
      return undefined;
  }
  return tools.isSupported(runtime) ? tools : undefined;
}
