import { DEFAULT_EXECUTABLE, EXECUTABLE_ENV_VAR } from './constants.js';

/**
 * Executable to launch: explicit option, then MTR_PACKET, then the default name
 */
export function resolveExecutable(
  executable?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (executable) return executable;
  const fromEnv = env[EXECUTABLE_ENV_VAR];
  return fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_EXECUTABLE;
}

/**
 * Full argument vector: the command prefix followed by the executable
 */
export function buildCommandLine(
  executable: string,
  commandPrefix: readonly string[] = []
): { command: string; args: string[] } {
  const [head, ...rest] = commandPrefix;
  if (head === undefined) return { command: executable, args: [] };
  return { command: head, args: [...rest, executable] };
}
