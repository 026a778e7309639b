export type TransportKind = 'serial' | 'tcp' | 'mock';

/**
 * Ordered byte stream to a companion device. Upstream code must not care which
 * variant it talks to.
 */
export interface ByteTransport {
  readonly kind: TransportKind;
  readonly address: string;
  readonly isOpen: boolean;

  /** Rejects with ConnectionError when the device is missing, refused or unreachable. */
  open(): Promise<void>;

  /**
   * Resolves with 0..maxBytes bytes. An empty buffer means the timeout elapsed
   * (or close() was called while waiting).
   */
  readTimeout(maxBytes: number, timeoutMs: number): Promise<Buffer>;

  write(data: Uint8Array): Promise<void>;

  /** Idempotent, and safe after a failed open(). */
  close(): Promise<void>;
}
