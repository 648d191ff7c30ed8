/**
 * Holds the current Config and swaps it as a whole on reload.
 *
 * Readers take one reference per unit of work (a scan tick reads `current`
 * once) so a reload can never be observed half-applied.
 *
 * @module
 */

import type { Config } from "./models/config.js";

export type ConfigListener = (next: Config, previous: Config) => void;

export class ConfigHolder {
  private config: Config;
  private listeners = new Set<ConfigListener>();
  private revision = 0;

  constructor(initial: Config) {
    this.config = initial;
  }

  get current(): Config {
    return this.config;
  }

  /** Incremented by every swap */
  get version(): number {
    return this.revision;
  }

  /**
   * Atomically replaces the configuration and notifies listeners.
   */
  swap(next: Config): Config {
    const previous = this.config;
    this.config = next;
    this.revision++;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
    return previous;
  }

  onSwap(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
