/**
 * Generator that runs a local command.
 *
 * The system prompt and prompt are written to the command's stdin; whatever
 * the command prints on stdout is taken as the generated text. Useful with
 * local model runners that read a prompt from stdin.
 *
 * @packageDocumentation
 */

import { execa, ExecaError } from 'execa';
import { Logger, toError } from '../utils/logger.js';
import {
  createFailureResult,
  createGeneratorError,
  createSuccessResult,
  type Generator,
  type GeneratorRequest,
  type GeneratorResult,
} from './types.js';

/**
 * Options for creating a CommandGenerator.
 */
export interface CommandGeneratorOptions {
  /** Executable to run. */
  readonly command: string;
  /** Arguments passed to the executable. */
  readonly args?: readonly string[];
  readonly logger?: Logger | undefined;
}

/**
 * Generator backed by a local subprocess.
 */
export class CommandGenerator implements Generator {
  readonly name = 'command';

  private readonly command: string;
  private readonly args: readonly string[];
  private readonly logger: Logger;

  /**
   * Creates a new CommandGenerator.
   *
   * @param options - Command, arguments and logger.
   */
  constructor(options: CommandGeneratorOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.logger = options.logger ?? new Logger({ component: 'CommandGenerator' });
  }

  /**
   * Runs the command once with the prompt on stdin.
   *
   * @param request - Prompt, system prompt and timeout.
   * @returns The command's stdout, or a failure.
   */
  async generate(request: GeneratorRequest): Promise<GeneratorResult> {
    const startTime = Date.now();
    const input = `${request.systemPrompt}\n\n${request.prompt}`;

    this.logger.info('llm_request', { command: this.command, promptLength: request.prompt.length });

    try {
      const result = await execa(this.command, [...this.args], {
        input,
        timeout: request.timeoutMs,
      });

      const latencyMs = Date.now() - startTime;
      this.logger.info('llm_response', { latencyMs, length: result.stdout.length });

      if (result.stdout.trim() === '') {
        return createFailureResult(
          createGeneratorError('EmptyResponseError', `Command '${this.command}' produced no output`)
        );
      }

      return createSuccessResult({ content: result.stdout, provider: this.name, latencyMs });
    } catch (error) {
      if (error instanceof ExecaError) {
        if (error.timedOut) {
          return createFailureResult(
            createGeneratorError(
              'TimeoutError',
              `Command timed out after ${String(request.timeoutMs)}ms`,
              { cause: error }
            )
          );
        }
        if (error.code === 'ENOENT') {
          return createFailureResult(
            createGeneratorError('NetworkError', `Command '${this.command}' not found`, {
              cause: error,
            })
          );
        }
        if (error.exitCode !== undefined) {
          const rawStderr: unknown = error.stderr;
          const stderr = typeof rawStderr === 'string' ? rawStderr.trim() : '';
          return createFailureResult(
            createGeneratorError(
              'ProviderError',
              `Command '${this.command}' exited with code ${String(error.exitCode)}: ${stderr}`,
              { statusCode: error.exitCode, cause: error }
            )
          );
        }
      }

      const cause = toError(error);
      return createFailureResult(
        createGeneratorError('UnexpectedError', `Command execution failed: ${cause.message}`, {
          cause,
        })
      );
    }
  }
}
