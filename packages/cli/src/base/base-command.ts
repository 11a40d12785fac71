/**
 * Base Command Class for the vulnrank CLI
 *
 * Shared output handling (text, --json, --verbose, --quiet) and access to the
 * dependency injection service.
 */

import { Command } from 'commander';
import { Errors } from '@vulnrank/core';
import type { Logger } from '@vulnrank/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Log level implied by the output flags. JSON output keeps stdout clean, so
 * only warnings and errors are logged (they go to stderr).
 */
export function logLevelForOptions(options: BaseCommandOptions): Logger.LogLevel | undefined {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  if (options.json) return 'warn';
  return undefined;
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected get dependencyService(): DependencyInjectionService {
    return DependencyInjectionService.getInstance();
  }

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Commands made only of sub-commands have no action of their own
   */
  async execute(options: TOptions): Promise<void> {
    this.handleError('No action specified. Use --help for available options.', options);
  }

  /**
   * Applies the output flags to logging. Call before resolving dependencies.
   */
  protected configureOutput(options: BaseCommandOptions): void {
    this.dependencyService.setLogLevel(logLevelForOptions(options));
  }

  /**
   * Runs an action, reporting any error through handleError.
   */
  protected async run(options: TOptions, failurePrefix: string, action: () => Promise<void>): Promise<void> {
    this.configureOutput(options);
    try {
      await action();
    } catch (error) {
      const message = Errors.errorMessage(error);
      this.handleError(`${failurePrefix}: ${message}`, options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: BaseCommandOptions, error?: Error, exitCode: number = 1): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error?.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   *
   * @param data - Payload printed under --json
   * @param message - Headline printed with ✅ in text mode
   * @param details - Extra human-readable lines for text mode
   */
  protected handleSuccess(data: unknown, options: BaseCommandOptions, message?: string, details?: string[]): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (options.quiet) return;

    if (message) {
      console.log(`✅ ${message}`);
    }
    for (const line of details ?? []) {
      console.log(line);
    }
  }
}

/**
 * Simple command class for commands without sub-commands
 */
export abstract class SimpleCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends BaseCommand<TOptions> {

  abstract execute(options: TOptions): Promise<void>;
}
