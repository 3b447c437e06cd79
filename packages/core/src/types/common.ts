/**
 * Common types used across the core package
 */

/**
 * Supported operating systems
 */
export enum OperatingSystem {
  LINUX = 'linux',
  MACOS = 'macos',
  WINDOWS = 'windows',
  UNKNOWN = 'unknown',
}

/**
 * Execution result for commands
 */
export interface ExecutionResult {
  stdout: string;
  stderr: string;
  code: number;
  success: boolean;
  timedOut: boolean;
}

/**
 * Options for a single command invocation
 */
export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs an external command; resolves with the outcome instead of rejecting
 */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<ExecutionResult>;
