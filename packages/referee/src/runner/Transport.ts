import type { OutgoingMessage } from '@q21-referee/protocol';

/**
 * One message picked up from the mailbox.
 */
export interface InboundMessage {
  readonly subject: string;
  /** Sender address as given by the transport */
  readonly from: string;
  /** Decoded JSON body */
  readonly body: unknown;
}

/**
 * Mail-style transport the runner polls and sends through.
 */
export interface Transport {
  /** Fetch every message that arrived since the last poll */
  poll(): Promise<InboundMessage[]>;
  send(message: OutgoingMessage): Promise<void>;
}
