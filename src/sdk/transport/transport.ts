/** Lifecycle state of a transport connection. */
export type TransportState = "connecting" | "open" | "closing" | "closed";

/** Who ended the connection. */
export type CloseInitiator = "caller" | "peer";

/** Details delivered once when a transport closes. */
export interface CloseInfo {
  initiator: CloseInitiator;
  /** WebSocket close code, when the transport has one. */
  code?: number;
  reason?: string;
  /** Set when the close was caused by a protocol or socket error. */
  error?: Error;
}

/** Callback cleanup handle. */
export interface Disposable {
  dispose(): void;
}

/**
 * Bidirectional text-frame channel.
 *
 * Implementations handle framing. Consumers send and receive whole message
 * bodies as strings; one call to a message handler is one frame.
 */
export interface Transport {
  /** Current connection state. */
  readonly state: TransportState;

  /** Write one frame. Rejects if not open or if the write fails. */
  send(data: string): Promise<void>;

  /** Register a handler for incoming frames. Returns cleanup handle. */
  onMessage(handler: (data: string) => void): Disposable;

  /** Register a handler for transport close. Fires once. */
  onClose(handler: (info: CloseInfo) => void): Disposable;

  /** Register a handler for non-fatal errors. */
  onError(handler: (error: Error) => void): Disposable;

  /** Gracefully shut down. Idempotent. */
  close(): void;
}
