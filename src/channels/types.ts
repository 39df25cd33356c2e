/**
 * Channel types and interfaces
 */

/**
 * Channel status
 */
export interface ChannelStatus {
  connected: boolean;
  lastActivity?: Date;
}

/**
 * Delivery contract: best-effort outbound messages to the owner
 */
export interface Channel {
  /** Unique channel identifier */
  readonly name: string;

  /** Start receiving updates */
  start(): Promise<void>;

  /** Stop the channel gracefully */
  stop(): Promise<void>;

  /** Check if channel is running */
  isRunning(): boolean;

  getStatus(): ChannelStatus;

  /** Send a message without a preceding user turn. Resolves false when the transport fails. */
  sendMessage(chatId: number, message: string): Promise<boolean>;
}
