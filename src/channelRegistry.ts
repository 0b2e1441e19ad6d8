import { channelIdToHex } from "./tunnelFrame";

export interface RegisteredChannel {
  readonly id: Buffer;
}

/**
 * Channel id -> channel for one connection epoch.
 *
 * Removal is keyed by identity: a channel tearing itself down can never evict a
 * newer channel that replaced it under the same id, and removing something
 * that is not there is a no-op.
 */
export class ChannelRegistry<C extends RegisteredChannel> {
  private readonly channels = new Map<string, C>();

  get size(): number {
    return this.channels.size;
  }

  get(channelId: Buffer): C | undefined {
    return this.channels.get(channelIdToHex(channelId));
  }

  has(channelId: Buffer): boolean {
    return this.channels.has(channelIdToHex(channelId));
  }

  /** Register `channel`, returning whatever was registered under its id before. */
  add(channel: C): C | undefined {
    const key = channelIdToHex(channel.id);
    const previous = this.channels.get(key);
    this.channels.set(key, channel);
    return previous;
  }

  remove(channel: C): boolean {
    const key = channelIdToHex(channel.id);
    if (this.channels.get(key) !== channel) return false;
    this.channels.delete(key);
    return true;
  }

  values(): C[] {
    return [...this.channels.values()];
  }

  /** Empty the registry and return everything that was in it. */
  drain(): C[] {
    const all = [...this.channels.values()];
    this.channels.clear();
    return all;
  }
}
