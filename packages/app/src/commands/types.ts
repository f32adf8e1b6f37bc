/**
 * Command types and interfaces
 */

/**
 * Base command interface
 */
export interface Command<TOptions, TOutput> {
  name: string;
  description: string;
  execute(args: string[], options: TOptions): Promise<CommandResult<TOutput>>;
}

/**
 * Command execution result
 */
export interface CommandResult<TOutput, TError extends Error = Error> {
  success: boolean;
  output: TOutput;
  error?: TError;
  duration?: number;
}
