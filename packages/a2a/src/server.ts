/**
 * A2AServer: node:http front for one agent.
 *
 * GET  /.well-known/agent.json  the agent's own descriptor
 * POST /                        JSON-RPC task requests
 *
 * JSON-RPC outcomes, including errors, are sent with status 200. A body over
 * MAX_REQUEST_BYTES is answered with 413 and an invalid-request envelope.
 */

import * as http from "node:http";
import { ProtocolInvalidRequestError } from "@switchboard/errors";
import { toAgentCard } from "./descriptor.js";
import { encodeResponse } from "./protocol.js";
import type { TaskRequestHandler } from "./request-handler.js";
import { extractTraceContext, withSpan } from "./tracing.js";
import type { AgentIdentity, CapabilityDescriptor } from "./types.js";
import { AGENT_CARD_PATH, MAX_REQUEST_BYTES } from "./types.js";
import { normalizeAgentUrl } from "./validation.js";

export interface A2AServerOptions {
  readonly port: number;
  readonly hostname: string;
  readonly identity: AgentIdentity;
  /** URL advertised in the descriptor; defaults to the bound address */
  readonly publicUrl?: string | undefined;
  readonly requestHandler: TaskRequestHandler;
  readonly maxRequestBytes?: number | undefined;
}

const JSON_HEADERS = { "Content-Type": "application/json" } as const;

export class A2AServer {
  private readonly _server: http.Server;
  private readonly _options: A2AServerOptions;
  private readonly _maxRequestBytes: number;

  constructor(options: A2AServerOptions) {
    this._options = options;
    this._maxRequestBytes = options.maxRequestBytes ?? MAX_REQUEST_BYTES;
    this._server = http.createServer((req: http.IncomingMessage, res: http.ServerResponse) => {
      this._handleRequest(req, res).catch((error: unknown) => {
        console.error("[A2AServer] Unhandled request failure:", error);
        if (!res.writableEnded) {
          res.statusCode = 500;
          res.end();
        }
      });
    });
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._server.once("error", reject);
      this._server.listen(this._options.port, this._options.hostname, () => {
        this._server.off("error", reject);
        console.info(`[A2AServer] ${this._options.identity.name} listening on ${this.url}/`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._server.close((err: Error | undefined) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number {
    const address = this._server.address();
    if (address !== null && typeof address === "object") {
      return address.port;
    }
    return this._options.port;
  }

  /** Base URL of the bound address */
  get url(): string {
    return `http://${this._options.hostname}:${this.port}`;
  }

  /** The descriptor served on the well-known path */
  get descriptor(): CapabilityDescriptor {
    const baseUrl = normalizeAgentUrl(this._options.publicUrl) || this.url;
    return Object.freeze({ ...this._options.identity, baseUrl, sourceUrl: baseUrl });
  }

  // -------------------------------------------------------------------------
  // Request handling
  // -------------------------------------------------------------------------

  private async _handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (path === AGENT_CARD_PATH) {
      if (req.method !== "GET") {
        this._reject(res, 405, "GET");
        return;
      }
      this._send(res, 200, JSON.stringify(toAgentCard(this.descriptor)));
      return;
    }

    if (path !== "/") {
      this._reject(res, 404);
      return;
    }
    if (req.method !== "POST") {
      this._reject(res, 405, "POST");
      return;
    }

    const body = await this._readBody(req);
    if (body === null) {
      const error = new ProtocolInvalidRequestError(
        `request body exceeds ${this._maxRequestBytes} bytes`,
      );
      this._send(res, 413, encodeResponse({ error }, null));
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const reply = await withSpan(
      "a2a.handle_request",
      { "a2a.agent.name": this._options.identity.name },
      () => this._options.requestHandler.handle(body, controller.signal),
      extractTraceContext(req.headers),
    );
    this._send(res, 200, reply);
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _send(res: http.ServerResponse, status: number, body: string): void {
    res.writeHead(status, JSON_HEADERS);
    res.end(body);
  }

  private _reject(res: http.ServerResponse, status: 404 | 405, allow?: string): void {
    res.statusCode = status;
    if (allow) res.setHeader("Allow", allow);
    res.end();
  }

  /**
   * Reads the whole request body. Returns null when it exceeds the size
   * limit; the rest of the stream is drained and discarded.
   */
  private async _readBody(req: http.IncomingMessage): Promise<Uint8Array | null> {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > this._maxRequestBytes) {
        tooLarge = true;
        chunks.length = 0;
        continue;
      }
      if (!tooLarge) chunks.push(buffer);
    }
    return tooLarge ? null : Buffer.concat(chunks);
  }
}
