export interface InboundMessage {
  /** Opaque token the source needs to acknowledge the message */
  id: string;
  data: string;
}

export interface MessageSource {
  /**
   * Wait for the next message. Resolves null when nothing arrived within the
   * source's poll window or when the signal fired.
   */
  receive(signal?: AbortSignal): Promise<InboundMessage | null>;
  acknowledge(message: InboundMessage): Promise<void>;
  close(): Promise<void>;
}

export interface MessageSink {
  send(payload: string): Promise<void>;
  close(): Promise<void>;
}
