import type { ChannelAdapter } from "./adapter.js";
import { NotFoundError, TwinError } from "../utils/errors.js";

/** Adapters by channel id. Dispatch looks the reply's channel up here. */
export class ChannelRegistry {
  private readonly adapters = new Map<string, ChannelAdapter>();

  register(adapter: ChannelAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new TwinError("channel_conflict", `Channel adapter already registered: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
  }

  get(id: string): ChannelAdapter | undefined {
    return this.adapters.get(id);
  }

  require(id: string): ChannelAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) throw new NotFoundError("channel", id);
    return adapter;
  }

  has(id: string): boolean {
    return this.adapters.has(id);
  }

  list(): ChannelAdapter[] {
    return [...this.adapters.values()];
  }
}
