/**
 * @fileoverview Email subject framing: `protocol::ROLE::email::txid::MESSAGETYPE`.
 */

import { createTxId } from './ids.js';

const SEPARATOR = '::';

export interface SubjectParts {
  readonly protocol: string;
  readonly role: string;
  readonly email: string;
  readonly txId: string;
  readonly messageType: string;
}

/**
 * Error thrown when a subject does not have exactly five `::`-separated parts.
 */
export class InvalidSubjectError extends Error {
  constructor(subject: string) {
    super(`Invalid subject: ${subject}`);
    this.name = 'InvalidSubjectError';
  }
}

/**
 * Build a subject line. Underscores in the message type are stripped.
 */
export function buildSubject(parts: Omit<SubjectParts, 'txId'> & { txId?: string }): string {
  const messageType = parts.messageType.replaceAll('_', '');
  const txId = parts.txId ?? createTxId();
  return [parts.protocol, parts.role, parts.email, txId, messageType].join(SEPARATOR);
}

/**
 * Parse a subject line.
 * @throws {InvalidSubjectError} unless the subject has exactly five parts
 */
export function parseSubject(subject: string): SubjectParts {
  const parts = subject.split(SEPARATOR);
  if (parts.length !== 5) {
    throw new InvalidSubjectError(subject);
  }
  const [protocol = '', role = '', email = '', txId = '', messageType = ''] = parts;
  return { protocol, role, email, txId, messageType };
}
