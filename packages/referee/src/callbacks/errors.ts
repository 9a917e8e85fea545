/**
 * @fileoverview Callback failure taxonomy and the terminal error block.
 */

import type { CallbackName } from './outputSchemas.js';

export type CallbackErrorType =
  | 'CALLBACK_TIMEOUT'
  | 'INVALID_JSON_RESPONSE'
  | 'SCHEMA_VALIDATION_FAILURE';

/**
 * Base class for failures of an injected decision callback.
 */
export abstract class CallbackError extends Error {
  abstract readonly errorType: CallbackErrorType;

  constructor(
    message: string,
    readonly callbackName: CallbackName,
    readonly inputPayload: unknown,
    readonly deadlineSeconds: number | null
  ) {
    super(message);
  }

  /** Callback output to print in the error block, if any */
  get outputPayload(): unknown {
    return undefined;
  }

  get validationErrors(): readonly string[] {
    return [];
  }
}

/**
 * Error thrown when a callback does not settle before its deadline.
 */
export class CallbackTimeoutError extends CallbackError {
  readonly errorType = 'CALLBACK_TIMEOUT';

  constructor(callbackName: CallbackName, deadlineSeconds: number, inputPayload: unknown) {
    super(
      `Callback '${callbackName}' exceeded its ${deadlineSeconds}s deadline`,
      callbackName,
      inputPayload,
      deadlineSeconds
    );
    this.name = 'CallbackTimeoutError';
  }
}

/**
 * Error thrown when a callback returns something other than an object.
 */
export class InvalidResponseError extends CallbackError {
  readonly errorType = 'INVALID_JSON_RESPONSE';

  constructor(
    callbackName: CallbackName,
    inputPayload: unknown,
    readonly rawOutput: unknown,
    deadlineSeconds: number | null = null
  ) {
    super(
      `Callback '${callbackName}' returned ${describe(rawOutput)}, expected an object`,
      callbackName,
      inputPayload,
      deadlineSeconds
    );
    this.name = 'InvalidResponseError';
  }

  override get outputPayload(): unknown {
    return this.rawOutput;
  }
}

/**
 * Error thrown when a callback output violates its schema.
 */
export class SchemaValidationError extends CallbackError {
  readonly errorType = 'SCHEMA_VALIDATION_FAILURE';

  constructor(
    callbackName: CallbackName,
    inputPayload: unknown,
    private readonly output: unknown,
    private readonly errors: readonly string[],
    deadlineSeconds: number | null = null
  ) {
    super(
      `Callback '${callbackName}' output failed validation: ${errors.join('; ')}`,
      callbackName,
      inputPayload,
      deadlineSeconds
    );
    this.name = 'SchemaValidationError';
  }

  override get outputPayload(): unknown {
    return this.output;
  }

  override get validationErrors(): readonly string[] {
    return this.errors;
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

// ============ Error Block ============

const RULE = '='.repeat(64);

function indentJson(data: unknown): string {
  const json = JSON.stringify(data, null, 2) ?? String(data);
  return json
    .split('\n')
    .map((line) => ` ${line}`)
    .join('\n');
}

/**
 * Render the delimited block printed before a strict-mode halt.
 */
export function formatErrorBlock(error: CallbackError, now: Date = new Date()): string {
  const lines = [
    '',
    RULE,
    ' CALLBACK ERROR: PROCESS TERMINATED',
    RULE,
    ` Timestamp:    ${now.toISOString()}`,
    ` Error Type:   ${error.errorType}`,
    ` Callback:     ${error.callbackName}`,
  ];

  if (error.deadlineSeconds !== null) {
    lines.push(` Deadline:     ${error.deadlineSeconds} seconds`);
  }

  lines.push('', ` ── INPUT PAYLOAD ${'─'.repeat(46)}`, indentJson(error.inputPayload));

  if (error.outputPayload !== undefined) {
    lines.push(
      '',
      ` ── OUTPUT PAYLOAD (from callback) ${'─'.repeat(29)}`,
      indentJson(error.outputPayload)
    );
  }

  if (error.validationErrors.length > 0) {
    lines.push('', ` ── VALIDATION ERRORS ${'─'.repeat(42)}`);
    for (const message of error.validationErrors) {
      lines.push(` • ${message}`);
    }
  }

  lines.push('', RULE, '');
  return lines.join('\n');
}
