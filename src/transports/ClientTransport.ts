/**
 * Generic client-side transport interface.
 *
 * The transport provides a single reconnecting WebSocket connection that
 * carries text frames. Protocol handling lives above it.
 */

export interface ClientTransport {
  /**
   * Whether currently connected.
   */
  readonly connected: boolean;

  /**
   * Whether a reconnect will be attempted after the connection ends.
   */
  readonly reconnecting: boolean;

  /**
   * Connect to a WebSocket URL and keep reconnecting until `close()`.
   * Rejects if the first attempt fails; reconnection continues regardless.
   */
  connect(url: string): Promise<void>;

  /**
   * Change the URL used by the next (re)connect. An open connection is not touched.
   */
  setUrl(url: string): void;

  /**
   * Close the connection and stop reconnect attempts.
   * Close callbacks run synchronously with `deliberate = true`.
   */
  close(): void;

  /**
   * Drop the current socket as if the peer went away. Reconnection continues.
   */
  terminate(): void;

  /**
   * Forget accumulated backoff and reconnect now if disconnected.
   */
  resetBackoff(): void;

  /**
   * Send a text message.
   */
  send(text: string): void;

  /**
   * Register lifecycle callbacks.
   */
  onOpen(cb: () => void): void;
  onClose(cb: (code: number, reason: string, deliberate: boolean) => void): void;
  onError(cb: (err: Error) => void): void;
  onMessage(cb: (text: string) => void): void;
  onReconnectFailed(cb: (err: Error) => void): void;
}
