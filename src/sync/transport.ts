/**
 * Transport Contract
 *
 * A transport is one physical connection attempt. The connection manager
 * creates a fresh transport for every attempt and never reuses a closed one.
 */

/**
 * Receives what a transport produces. `onClose` is called at most once, and
 * never after the owner called `close()`.
 */
export interface TransportSink<TFrame> {
  onFrame(frame: TFrame): void
  onClose(error?: Error): void
}

export interface Transport<TFrame> {
  /**
   * Starts connecting. Failures are reported through `sink.onClose`.
   */
  open(sink: TransportSink<TFrame>): void
  /**
   * Writes one text frame.
   *
   * @throws ConnectionError when the transport cannot send
   */
  send(text: string): void
  /** Closes the transport; no sink callback follows. */
  close(): void
}

export type TransportFactory<TFrame> = () => Transport<TFrame>
