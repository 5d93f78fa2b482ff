/**
 * Orchestrator: one name space over remote agents and external tools.
 *
 * Agents are registered first, in discovery order, then tools in gateway
 * order. The table only changes on refresh(), which builds a new registry
 * and swaps it in whole.
 */

import {
  type AgentRegistry,
  type CapabilityDescriptor,
  ConnectorCache,
  withSpan,
} from "@switchboard/a2a";
import type { McpTool, ToolGateway } from "@switchboard/mcp";
import { AgentCapability, ToolCapability } from "./capability.js";
import { CapabilityRegistry } from "./capability-registry.js";
import type {
  CapabilityHandler,
  CapabilityKind,
  CapabilitySummary,
  DispatchResult,
} from "./types.js";

export interface OrchestratorOptions {
  readonly agents: AgentRegistry;
  readonly tools?: ToolGateway | undefined;
  readonly connectors?: ConnectorCache | undefined;
}

export class Orchestrator {
  private readonly agents: AgentRegistry;
  private readonly tools: ToolGateway | undefined;
  private readonly connectors: ConnectorCache;
  private registry = new CapabilityRegistry();

  constructor(options: OrchestratorOptions) {
    this.agents = options.agents;
    this.tools = options.tools;
    this.connectors = options.connectors ?? new ConnectorCache();
  }

  /**
   * Re-discover agents and tools, then replace the capability table and
   * drop cached connectors.
   */
  async refresh(signal?: AbortSignal): Promise<readonly string[]> {
    const [descriptors, tools] = await Promise.all([
      this.agents.refresh(signal),
      this.tools ? this.tools.discoverTools() : Promise.resolve<readonly McpTool[]>([]),
    ]);

    this.connectors.clear();
    this.registry = this.buildRegistry(descriptors, tools);
    console.info(
      `[Orchestrator] ${this.registry.size} capabilities (${descriptors.length} agent(s), ${tools.length} tool(s))`,
    );
    return this.listCapabilities();
  }

  listCapabilities(): readonly string[] {
    return this.registry.names();
  }

  listAgents(): readonly string[] {
    return this.namesOfKind("agent");
  }

  listTools(): readonly McpTool[] {
    const names = new Set(this.namesOfKind("tool"));
    return Object.freeze((this.tools?.listTools() ?? []).filter((t) => names.has(t.name)));
  }

  describe(): readonly CapabilitySummary[] {
    return Object.freeze(
      this.registry
        .list()
        .map((h) => Object.freeze({ name: h.name, kind: h.kind, description: h.description })),
    );
  }

  resolve(name: string, kind?: CapabilityKind): CapabilityHandler {
    return this.registry.resolve(name, kind);
  }

  /**
   * Resolve `name` and call it. Agents answer with the text of the last
   * history entry of their task; tools with their result.
   */
  async dispatch(
    name: string,
    payload: unknown,
    sessionId: string,
    signal?: AbortSignal,
  ): Promise<DispatchResult> {
    return this.invoke(this.registry.resolve(name), name, payload, sessionId, signal);
  }

  /**
   * Send `message` to the agent named `agentName`. Only agents are
   * candidates, so a name that matches nothing but a tool is unknown here.
   */
  async delegate(
    agentName: string,
    message: string,
    sessionId: string,
    signal?: AbortSignal,
  ): Promise<DispatchResult> {
    const handler = this.registry.resolve(agentName, "agent");
    return this.invoke(handler, agentName, message, sessionId, signal);
  }

  private invoke(
    handler: CapabilityHandler,
    name: string,
    payload: unknown,
    sessionId: string,
    signal: AbortSignal | undefined,
  ): Promise<DispatchResult> {
    return withSpan(
      "orchestrator.dispatch",
      {
        "capability.query": name,
        "capability.name": handler.name,
        "capability.kind": handler.kind,
        "session.id": sessionId,
      },
      () => handler.invoke(payload, sessionId, signal),
    );
  }

  private buildRegistry(
    descriptors: readonly CapabilityDescriptor[],
    tools: readonly McpTool[],
  ): CapabilityRegistry {
    const registry = new CapabilityRegistry();
    for (const descriptor of descriptors) {
      registry.register(new AgentCapability(descriptor, this.connectors.getOrCreate(descriptor)));
    }
    if (this.tools) {
      for (const tool of tools) {
        registry.register(new ToolCapability(tool, this.tools));
      }
    }
    return registry;
  }

  private namesOfKind(kind: CapabilityKind): readonly string[] {
    return Object.freeze(
      this.registry
        .list()
        .filter((h) => h.kind === kind)
        .map((h) => h.name),
    );
  }
}
