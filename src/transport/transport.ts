export type QoS = 0 | 1 | 2;

export type PublishOptions = {
  qos?: QoS;
  retain?: boolean;
};

export type MessageListener = (topic: string, payload: Buffer) => void;

export interface Transport {
  readonly connected: boolean;
  publish(topic: string, payload: string, options?: PublishOptions): void;
  subscribe(topic: string, qos?: QoS): void;
  /** Fires on the first connect and on every reconnect. Returns a detach function. */
  onConnect(listener: () => void): () => void;
  onMessage(listener: MessageListener): () => void;
  end(): Promise<void>;
}
