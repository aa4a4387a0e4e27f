import { ConflictError } from '../errors';
import type { Plugin, RouteResult } from './types';

export class PluginRegistry {
  private plugins = new Map<string, Plugin>();

  /** Registers a plugin under its name. Names are unique per registry. */
  register(plugin: Plugin): void {
    if (this.plugins.has(plugin.name)) {
      throw new ConflictError(`Plugin ${plugin.name} is already registered`);
    }
    this.plugins.set(plugin.name, plugin);
  }

  unregister(name: string): boolean {
    return this.plugins.delete(name);
  }

  get(name: string): Plugin | null {
    return this.plugins.get(name) ?? null;
  }

  list(): Plugin[] {
    return [...this.plugins.values()];
  }

  /**
   * Picks the first plugin, in registration order, that supports the
   * platform. Unsupported platforms are reported back rather than thrown.
   */
  route(platform: string): RouteResult {
    const key = platform.trim().toLowerCase();
    for (const plugin of this.plugins.values()) {
      if (plugin.supportedPlatforms.has(key)) {
        return { handled: true, plugin };
      }
    }
    return { handled: false, platform: key };
  }
}
