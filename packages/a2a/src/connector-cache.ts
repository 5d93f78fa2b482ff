/**
 * One AgentConnector per agent: base URL and name.
 *
 * Lookup and insertion are synchronous, so two concurrent callers for the
 * same agent always share one connector. Cleared when the registry refreshes.
 */

import { AgentConnector } from "./connector.js";
import type { AgentAuthConfig, CapabilityDescriptor } from "./types.js";

export interface ConnectorCacheConfig {
  /** Per-call timeout handed to every connector */
  readonly timeoutMs?: number | undefined;
  /** Auth keyed by normalized agent base URL */
  readonly auth?: ReadonlyMap<string, AgentAuthConfig> | undefined;
}

function cacheKey(descriptor: CapabilityDescriptor): string {
  return `${descriptor.baseUrl}#${descriptor.name}`;
}

export class ConnectorCache {
  private readonly entries: Map<string, AgentConnector> = new Map();
  private readonly timeoutMs: number | undefined;
  private readonly authMap: ReadonlyMap<string, AgentAuthConfig>;

  constructor(config?: ConnectorCacheConfig) {
    this.timeoutMs = config?.timeoutMs;
    this.authMap = config?.auth ?? new Map();
  }

  /**
   * Return the cached connector for the descriptor's agent, creating it on
   * first use. Two agents served from one URL get separate connectors.
   */
  getOrCreate(descriptor: CapabilityDescriptor): AgentConnector {
    const key = cacheKey(descriptor);
    const existing = this.entries.get(key);
    if (existing) return existing;

    const connector = new AgentConnector(descriptor, {
      timeoutMs: this.timeoutMs,
      auth: this.authMap.get(descriptor.baseUrl),
    });
    this.entries.set(key, connector);
    return connector;
  }

  has(descriptor: CapabilityDescriptor): boolean {
    return this.entries.has(cacheKey(descriptor));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
