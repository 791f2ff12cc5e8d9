import { spawn, execFileSync, type StdioOptions } from 'node:child_process';
import { accessSync, constants } from 'node:fs';
import type { Readable, Writable } from 'node:stream';

export const DEFAULT_RENDERER = 'whiptail';

/**
 * The parts of a child process the invoker relies on.
 * Node's ChildProcess satisfies it; tests substitute an in-process fake.
 */
export interface RendererChild {
  readonly stdin: Writable | null;
  readonly stderr: Readable | null;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null) => void): unknown;
}

export interface SpawnRendererOptions {
  env: NodeJS.ProcessEnv;
  stdio: StdioOptions;
}

export type RendererSpawner = (
  command: string,
  args: readonly string[],
  options: SpawnRendererOptions
) => RendererChild;

export const spawnRenderer: RendererSpawner = (command, args, options) =>
  spawn(command, [...args], { env: options.env, stdio: options.stdio });

/**
 * Resolve the full absolute path of a command via the shell's `command -v`.
 * Returns undefined if resolution fails.
 */
function resolveFullPath(name: string): string | undefined {
  try {
    return execFileSync('/bin/sh', ['-c', `command -v ${name}`], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'ignore'],
    }).trim() || undefined;
  } catch {
    return undefined;
  }
}

function isExecutable(candidate: string): boolean {
  try {
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the renderer executable path.
 * An explicit path wins; otherwise PATH lookup, then the usual install locations.
 */
export function getRendererPath(configPath?: string): string {
  if (configPath) return configPath;

  const fullPath = resolveFullPath(DEFAULT_RENDERER);
  if (fullPath) return fullPath;

  for (const candidate of ['/usr/bin/whiptail', '/bin/whiptail', '/usr/local/bin/whiptail']) {
    if (isExecutable(candidate)) return candidate;
  }

  // Last resort: return bare name and let spawn() fail with a clear error
  return DEFAULT_RENDERER;
}
