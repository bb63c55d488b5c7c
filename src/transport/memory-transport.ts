import type { MessageListener, PublishOptions, QoS, Transport } from "./transport.js";

export type PublishedMessage = {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
};

export class MemoryTransport implements Transport {
  readonly published: PublishedMessage[] = [];
  readonly retained = new Map<string, string>();
  readonly subscriptions = new Map<string, QoS>();
  private isConnected = false;
  private connectListeners = new Set<() => void>();
  private messageListeners = new Set<MessageListener>();

  get connected(): boolean {
    return this.isConnected;
  }

  connect(): void {
    this.isConnected = true;
    for (const listener of [...this.connectListeners]) {
      listener();
    }
  }

  publish(topic: string, payload: string, options: PublishOptions = {}): void {
    const retain = options.retain ?? false;
    this.published.push({ topic, payload, qos: options.qos ?? 0, retain });
    if (!retain) return;
    if (payload === "") {
      this.retained.delete(topic);
    } else {
      this.retained.set(topic, payload);
    }
  }

  subscribe(topic: string, qos: QoS = 0): void {
    this.subscriptions.set(topic, qos);
  }

  /** Delivers an inbound message if something subscribed to exactly this topic. */
  deliver(topic: string, payload: string | Buffer): boolean {
    if (!this.subscriptions.has(topic)) return false;
    const raw = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
    for (const listener of [...this.messageListeners]) {
      listener(topic, raw);
    }
    return true;
  }

  onConnect(listener: () => void): () => void {
    this.connectListeners.add(listener);
    return () => {
      this.connectListeners.delete(listener);
    };
  }

  onMessage(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  lastPublished(topic: string): PublishedMessage | undefined {
    return this.published.filter((message) => message.topic === topic).at(-1);
  }

  async end(): Promise<void> {
    this.isConnected = false;
  }
}
