/**
 * Conflating Subscriber
 * One subscriber's send slot: at most one frame in flight and one waiting.
 * A newer frame replaces the waiting one.
 */

import { WebSocket } from 'ws';

// The part of a ws socket the slot needs
export interface SubscriberSocket {
  readonly readyState: number;
  send(data: Buffer, cb?: (error?: Error) => void): void;
}

export interface SubscriberStats {
  sent: number;
  dropped: number;
  errors: number;
}

export class ConflatingSubscriber {
  readonly id: string;
  private socket: SubscriberSocket;
  private onError: (error: Error) => void;

  private pending: Buffer | null = null;
  private inFlight = false;
  private stats: SubscriberStats = { sent: 0, dropped: 0, errors: 0 };

  constructor(id: string, socket: SubscriberSocket, onError: (error: Error) => void = () => undefined) {
    this.id = id;
    this.socket = socket;
    this.onError = onError;
  }

  offer(frame: Buffer): void {
    if (this.socket.readyState !== WebSocket.OPEN) return;

    if (this.inFlight) {
      if (this.pending) this.stats.dropped++;
      this.pending = frame;
      return;
    }

    this.transmit(frame);
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  isSending(): boolean {
    return this.inFlight;
  }

  getStats(): SubscriberStats {
    return { ...this.stats };
  }

  discard(): void {
    if (this.pending) this.stats.dropped++;
    this.pending = null;
  }

  private transmit(frame: Buffer): void {
    this.inFlight = true;
    try {
      this.socket.send(frame, (error) => this.handleSent(error));
    } catch (error) {
      this.inFlight = false;
      this.stats.errors++;
      this.onError(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private handleSent(error?: Error): void {
    this.inFlight = false;

    if (error) {
      this.stats.errors++;
      this.onError(error);
    } else {
      this.stats.sent++;
    }

    const next = this.pending;
    this.pending = null;
    if (next && this.socket.readyState === WebSocket.OPEN) {
      this.transmit(next);
    }
  }
}
