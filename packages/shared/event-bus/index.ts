/**
 * pipetrack Event Bus — best-effort status notifications
 *
 * In-process pub/sub. The store is the source of truth; the bus only tells
 * interested parties (SSE clients, the CLI, tests) that something changed.
 * A handler that throws is logged and never affects the publisher.
 *
 * The protocol publishes: pipeline.stage_updated, pipeline.status_changed,
 *   pipeline.completed, pipeline.failed
 * The API publishes: pipeline.created, pipeline.deleted
 * The dispatcher publishes: pipeline.triggered
 */

import type { EventChannel, BusEvent, EventHandler } from '../types/index.js';
import type { Logger } from '../logger/index.js';
import { errorMessage } from '../errors/index.js';

type ChannelPattern = EventChannel | 'pipeline.*' | '*';

interface Subscription {
  id: string;
  channel: ChannelPattern;
  handler: EventHandler;
  once: boolean;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<ChannelPattern, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;
  private logger: Logger | null;

  constructor(opts?: { maxHistory?: number; logger?: Logger }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
    this.logger = opts?.logger ?? null;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on(channel: ChannelPattern, handler: EventHandler): () => void {
    return this.subscribe(channel, handler, false);
  }

  /**
   * Subscribe to a channel for exactly one event.
   */
  once(channel: ChannelPattern, handler: EventHandler): () => void {
    return this.subscribe(channel, handler, true);
  }

  /**
   * Publish an event. Exact, prefix ('pipeline.*') and wildcard ('*')
   * subscribers are notified in subscription order.
   */
  async emit<T>(event: BusEvent<T>): Promise<void> {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();
    for (const [channel, subIds] of this.channelIndex) {
      if (matches(channel, event.channel)) {
        for (const id of subIds) matchingIds.add(id);
      }
    }

    const ordered = [...matchingIds].sort((a, b) => subNumber(a) - subNumber(b));
    const toRemove: string[] = [];

    for (const id of ordered) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.handler(event);
      } catch (err) {
        this.logger?.error('event handler failed', {
          channel: event.channel,
          error: errorMessage(err),
        });
      }

      if (sub.once) toRemove.push(id);
    }

    for (const id of toRemove) {
      this.unsubscribe(id);
    }
  }

  /**
   * Recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [channel, ids] of this.channelIndex) {
      stats[channel] = ids.size;
    }
    return stats;
  }

  clear(): void {
    this.subscriptions.clear();
    this.channelIndex.clear();
    this.history = [];
  }

  private subscribe(channel: ChannelPattern, handler: EventHandler, once: boolean): () => void {
    const id = `sub_${++this.subCounter}`;
    this.subscriptions.set(id, { id, channel, handler, once });

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

function matches(pattern: ChannelPattern, channel: EventChannel): boolean {
  if (pattern === '*' || pattern === channel) return true;
  if (pattern.endsWith('.*')) {
    return channel.startsWith(pattern.slice(0, -1));
  }
  return false;
}

function subNumber(id: string): number {
  return Number(id.slice('sub_'.length));
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<T>(
  channel: EventChannel,
  source: BusEvent['source'],
  payload: T,
  pipelineId: number | null = null
): BusEvent<T> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    pipelineId,
    payload,
  };
}
