/**
 * OrchestratorNode: wires discovery, the tool gateway, the orchestrator
 * agent and the task endpoint into one runnable agent.
 */

import {
  A2AServer,
  type AgentAuthConfig,
  type AgentIdentity,
  AgentRegistry,
  ConnectorCache,
  DiscoveryClient,
  loadAgentRegistryFile,
  TaskManager,
  TaskRequestHandler,
} from "@switchboard/a2a";
import {
  loadMcpConfigFile,
  type McpServerConfig,
  ToolGateway,
  type TransportFactory,
} from "@switchboard/mcp";
import { loadNodeConfig, type NodeConfig } from "./config.js";
import { Orchestrator } from "./orchestrator.js";
import { OrchestratorAgent } from "./orchestrator-agent.js";
import type { Planner } from "./types.js";

export interface OrchestratorNodeDeps {
  readonly planner: Planner;
  /** Replaces the stdio/HTTP transports to tool servers */
  readonly createTransport?: TransportFactory | undefined;
  /** Auth per agent base URL */
  readonly auth?: ReadonlyMap<string, AgentAuthConfig> | undefined;
}

function nodeIdentity(config: NodeConfig): AgentIdentity {
  return {
    name: config.name,
    description: config.description,
    version: "1.0.0",
    supportedInputModes: ["text"],
    supportedOutputModes: ["text"],
    capabilities: { streaming: false, pushNotifications: false },
    skills: [
      {
        id: "orchestrate",
        name: "Orchestrate",
        description: "Routes a request to the remote agent or tool that can answer it",
        tags: ["routing", "orchestration"],
        examples: ["What time is it?"],
      },
    ],
  };
}

export class OrchestratorNode {
  readonly config: NodeConfig;
  readonly orchestrator: Orchestrator;
  readonly taskManager: TaskManager;
  readonly server: A2AServer;

  private constructor(
    config: NodeConfig,
    sources: readonly string[],
    servers: ReadonlyMap<string, McpServerConfig>,
    deps: OrchestratorNodeDeps,
  ) {
    this.config = config;

    const discovery = new DiscoveryClient(sources, { timeoutMs: config.discoveryTimeoutMs });
    this.orchestrator = new Orchestrator({
      agents: new AgentRegistry(discovery),
      tools: new ToolGateway({ servers, createTransport: deps.createTransport }),
      connectors: new ConnectorCache({ timeoutMs: config.taskTimeoutMs, auth: deps.auth }),
    });

    const agent = new OrchestratorAgent({
      orchestrator: this.orchestrator,
      planner: deps.planner,
      maxSteps: config.maxPlannerSteps,
    });

    this.taskManager = new TaskManager();
    this.server = new A2AServer({
      port: config.port,
      hostname: config.host,
      identity: nodeIdentity(config),
      publicUrl: config.publicUrl,
      requestHandler: new TaskRequestHandler({ taskManager: this.taskManager, agent: agent.handle }),
    });
  }

  /**
   * Validate the config and load the agent and tool server lists it points
   * at. Nothing is discovered until start().
   */
  static async create(rawConfig: unknown, deps: OrchestratorNodeDeps): Promise<OrchestratorNode> {
    const config = loadNodeConfig(rawConfig);

    const fromFile = config.agentRegistryFile
      ? await loadAgentRegistryFile(config.agentRegistryFile)
      : [];
    const servers = config.mcpConfigFile
      ? await loadMcpConfigFile(config.mcpConfigFile)
      : new Map<string, McpServerConfig>();

    return new OrchestratorNode(config, [...fromFile, ...(config.agents ?? [])], servers, deps);
  }

  /** Discover agents and tools, then start serving tasks */
  async start(): Promise<void> {
    await this.orchestrator.refresh();
    await this.server.start();
  }

  async stop(): Promise<void> {
    await this.server.stop();
  }

  get url(): string {
    return this.server.url;
  }
}
