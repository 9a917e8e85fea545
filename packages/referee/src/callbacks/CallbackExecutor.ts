/**
 * @fileoverview Runs decision callbacks under a deadline with output validation.
 *
 * Steps, in order:
 * 1. Call the strategy, racing it against its deadline
 * 2. Reject any result that is not a key-value object
 * 3. Validate against the callback's output schema
 *
 * In strict mode a failure prints the error block and halts the process;
 * in safe mode it is thrown to the caller.
 */

import { isPayloadObject } from '@q21-referee/protocol';
import type { CallbackMode } from '../config/refereeConfig.js';
import { logger } from '../utils/logger.js';
import type { ProtocolLogger } from '../utils/protocolLogger.js';
import {
  CallbackError,
  CallbackTimeoutError,
  formatErrorBlock,
  InvalidResponseError,
  SchemaValidationError,
} from './errors.js';
import type { CallbackSpec, RefereeAI } from './types.js';

export interface CallbackExecutorOptions {
  mode: CallbackMode;
  /** Called after a strict-mode failure has been logged */
  halt?: (exitCode: number) => void;
  protocolLogger?: ProtocolLogger;
}

export class CallbackExecutor {
  private readonly mode: CallbackMode;
  private readonly halt: (exitCode: number) => void;
  private readonly protocolLogger: ProtocolLogger | undefined;

  constructor(
    private readonly ai: RefereeAI,
    options: CallbackExecutorOptions
  ) {
    this.mode = options.mode;
    this.halt = options.halt ?? ((exitCode) => process.exit(exitCode));
    this.protocolLogger = options.protocolLogger;
  }

  getMode(): CallbackMode {
    return this.mode;
  }

  /**
   * Execute a callback in the configured mode.
   */
  execute<TContext, TOutput>(
    spec: CallbackSpec<TContext, TOutput>,
    context: TContext
  ): Promise<TOutput> {
    return this.run(spec, context, this.mode);
  }

  /**
   * Execute a callback, throwing on failure regardless of the configured mode.
   * Used on abort paths, where the match must still be reported.
   */
  executeSafe<TContext, TOutput>(
    spec: CallbackSpec<TContext, TOutput>,
    context: TContext
  ): Promise<TOutput> {
    return this.run(spec, context, 'safe');
  }

  private async run<TContext, TOutput>(
    spec: CallbackSpec<TContext, TOutput>,
    context: TContext,
    mode: CallbackMode
  ): Promise<TOutput> {
    const { name, deadline_seconds: deadlineSeconds } = spec.service;
    logger.debug('Executing callback', { callback: name, deadlineSeconds });
    this.protocolLogger?.callbackCall(name);

    try {
      const result = await this.invokeWithDeadline(spec, context);

      if (!isPayloadObject(result)) {
        throw new InvalidResponseError(name, context, result, deadlineSeconds);
      }

      const validation = spec.parse(result);
      if (!validation.success) {
        throw new SchemaValidationError(
          name,
          context,
          result,
          validation.errors,
          deadlineSeconds
        );
      }

      this.protocolLogger?.callbackResponse(name);
      return validation.data;
    } catch (error) {
      if (mode === 'strict' && error instanceof CallbackError) {
        logger.error(formatErrorBlock(error));
        this.protocolLogger?.error(`${error.errorType} in ${name}`);
        this.halt(1);
      }
      throw error;
    }
  }

  private async invokeWithDeadline<TContext, TOutput>(
    spec: CallbackSpec<TContext, TOutput>,
    context: TContext
  ): Promise<unknown> {
    const { name, deadline_seconds: deadlineSeconds } = spec.service;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const call = Promise.resolve().then(() =>
      spec.invoke(this.ai, context, { signal: controller.signal })
    );
    // A call that outlives its deadline is detached; its late outcome is only logged.
    void call.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.warn('Detached callback failed after its deadline', {
          callback: name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CallbackTimeoutError(name, deadlineSeconds, context));
      }, deadlineSeconds * 1000);
    });

    try {
      return await Promise.race([call, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
