/**
 * Agent discovery.
 *
 * DiscoveryClient fetches descriptors from a list of base URLs; a source that
 * fails is logged and skipped so one bad peer never hides the others.
 * AgentRegistry keeps the last discovered set as an immutable snapshot.
 */

import { readFile } from "node:fs/promises";
import {
  ConnectorDecodeError,
  ConnectorTransportError,
  getErrorMessage,
} from "@switchboard/errors";
import { toCapabilityDescriptor } from "./descriptor.js";
import { type FetchedText, fetchTextWithTimeout, isAbortError, isTimeoutError } from "./fetch.js";
import type { CapabilityDescriptor, DiscoveryOptions } from "./types.js";
import { AGENT_CARD_PATH, DEFAULT_DISCOVERY_TIMEOUT_MS } from "./types.js";
import {
  DiscoveryOptionsSchema,
  formatIssues,
  normalizeAgentUrl,
  RawAgentCardSchema,
  validateOptions,
} from "./validation.js";

/**
 * Normalize a configured source list: keep valid http(s) URLs without
 * trailing slashes, first occurrence wins.
 */
export function loadSources(raw: unknown): readonly string[] {
  if (!Array.isArray(raw)) {
    console.warn("[DiscoveryClient] Agent registry is not a list of URLs; using no agents");
    return Object.freeze([]);
  }
  const seen = new Set<string>();
  for (const entry of raw) {
    const url = normalizeAgentUrl(entry);
    if (url === "") {
      console.warn(`[DiscoveryClient] Ignoring invalid agent URL: ${JSON.stringify(entry)}`);
      continue;
    }
    seen.add(url);
  }
  return Object.freeze([...seen]);
}

/**
 * Read a JSON array of agent base URLs. A missing or unreadable file yields
 * an empty list.
 */
export async function loadAgentRegistryFile(path: string): Promise<readonly string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    console.warn(`[DiscoveryClient] Agent registry ${path} not readable: ${getErrorMessage(error)}`);
    return Object.freeze([]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    console.error(`[DiscoveryClient] Agent registry ${path} is not valid JSON: ${getErrorMessage(error)}`);
    return Object.freeze([]);
  }
  return loadSources(parsed);
}

export class DiscoveryClient {
  readonly sources: readonly string[];
  private readonly timeoutMs: number;

  constructor(sources: unknown, options?: DiscoveryOptions) {
    validateOptions(DiscoveryOptionsSchema, options, "discovery");
    this.sources = loadSources(sources);
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
  }

  /**
   * Fetch every source concurrently. Returns the descriptors that could be
   * fetched, in source order.
   */
  async discover(signal?: AbortSignal): Promise<readonly CapabilityDescriptor[]> {
    const results = await Promise.allSettled(
      this.sources.map((url) => this.fetchDescriptor(url, signal)),
    );

    const descriptors: CapabilityDescriptor[] = [];
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        descriptors.push(result.value);
      } else {
        console.warn(
          `[DiscoveryClient] Skipping ${this.sources[i] ?? "unknown source"}: ${getErrorMessage(result.reason)}`,
        );
      }
    });
    return Object.freeze(descriptors);
  }

  /**
   * Fetch and validate one agent's descriptor.
   */
  async fetchDescriptor(baseUrl: string, signal?: AbortSignal): Promise<CapabilityDescriptor> {
    const cardUrl = `${baseUrl}${AGENT_CARD_PATH}`;

    let response: FetchedText;
    try {
      response = await fetchTextWithTimeout(
        cardUrl,
        { method: "GET", headers: { Accept: "application/json" } },
        this.timeoutMs,
        signal,
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new ConnectorTransportError(
          baseUrl,
          cardUrl,
          `Request timed out after ${this.timeoutMs}ms`,
          { timedOut: true },
        );
      }
      if (isAbortError(error) && signal?.aborted) throw error;
      throw new ConnectorTransportError(baseUrl, cardUrl, getErrorMessage(error), {
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (response.status !== 200) {
      throw new ConnectorTransportError(baseUrl, cardUrl, `HTTP ${response.status}`, {
        status: response.status,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(response.body);
    } catch {
      throw new ConnectorDecodeError(baseUrl, cardUrl, "Invalid JSON in Agent Card response");
    }

    const card = RawAgentCardSchema.safeParse(raw);
    if (!card.success) {
      throw new ConnectorDecodeError(
        baseUrl,
        cardUrl,
        `Invalid Agent Card: ${formatIssues(card.error)}`,
      );
    }
    return toCapabilityDescriptor(card.data, baseUrl);
  }
}

export class AgentRegistry {
  private readonly discovery: DiscoveryClient;
  private snapshot: readonly CapabilityDescriptor[] = Object.freeze([]);

  constructor(discovery: DiscoveryClient) {
    this.discovery = discovery;
  }

  /**
   * Re-run discovery and replace the snapshot in one step. Readers never see
   * a partially refreshed list.
   */
  async refresh(signal?: AbortSignal): Promise<readonly CapabilityDescriptor[]> {
    const discovered = await this.discovery.discover(signal);

    const byName = new Map<string, CapabilityDescriptor>();
    for (const descriptor of discovered) {
      if (byName.has(descriptor.name)) {
        console.warn(
          `[AgentRegistry] Duplicate agent name "${descriptor.name}" at ${descriptor.baseUrl}; keeping the first`,
        );
        continue;
      }
      byName.set(descriptor.name, descriptor);
    }

    this.snapshot = Object.freeze([...byName.values()]);
    console.info(`[AgentRegistry] Discovered ${this.snapshot.length} agent(s)`);
    return this.snapshot;
  }

  list(): readonly CapabilityDescriptor[] {
    return this.snapshot;
  }

  get(name: string): CapabilityDescriptor | undefined {
    return this.snapshot.find((d) => d.name === name);
  }
}
