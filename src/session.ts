/**
 * Tool Session
 *
 * Owns one connection to a tool server: the transport (a spawned child
 * process speaking MCP over stdio), the tool catalog and the elicitation
 * slot. All three live and die with the session.
 *
 * Calls the client makes are serialized, one outstanding request at a time.
 * Callbacks the server makes (roots, sampling, elicitation) are serviced
 * while a call is outstanding.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { Stream } from "stream";
import {
  CallToolResultSchema,
  ErrorCode,
  McpError,
  ToolListChangedNotificationSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type {
  Implementation,
  ReadResourceResult,
  Resource,
} from "@modelcontextprotocol/sdk/types.js";
import {
  ElicitationHandler,
  RootsHandler,
  SamplingHandler,
  callbackCapabilities,
  registerCallbacks,
  type CallbackTable,
} from "./callbacks/index.js";
import {
  ConnectionError,
  HandshakeError,
  TransportError,
  UnknownToolError,
} from "./errors.js";
import { formatToolResult, unwrapToolResult } from "./invoke.js";
import { assertCommandExists, assertPathsExist } from "./launch.js";
import { createNullLogger, errorMessage, type StructuredLogger } from "./logging.js";
import type { ModelBackend } from "./model/model-backend.js";
import { RequestTracker, type TrackedRequest } from "./request-tracker.js";
import { ElicitationSlot } from "./state/elicitation-slot.js";
import { ToolCatalog } from "./state/tool-catalog.js";
import type {
  CallOptions,
  ElicitationPolicy,
  PendingElicitation,
  Root,
  SessionStatus,
  ToolDescriptor,
  ToolInvocationResult,
  ToolInvoker,
} from "./types.js";

const DEFAULT_CLIENT_INFO: Implementation = {
  name: "mcp-primitives-client",
  version: "0.1.0",
};

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30000;
// Generous: a call may be waiting on a human answering an elicitation
const DEFAULT_REQUEST_TIMEOUT_MS = 5 * 60 * 1000;
const MAX_STDERR_LINES = 1000;

const SPAWN_ERROR_CODES = new Set(["ENOENT", "EACCES", "ENOTDIR", "EPERM"]);

/**
 * How to start the tool server
 */
export interface SessionLaunch {
  /** Command to execute */
  command: string;
  /** Arguments to pass to the command */
  args?: string[];
  /** Environment overrides, merged over the SDK's safe default environment */
  env?: Record<string, string>;
  /** Working directory for the process */
  cwd?: string;
}

/**
 * Builds the transport for a launch. Defaults to a stdio child process;
 * tests supply an in-process transport instead.
 */
export type TransportFactory = (launch: SessionLaunch) => Transport;

/**
 * Options for connecting a ToolSession
 */
export interface SessionOptions extends SessionLaunch {
  /** Filesystem boundaries reported to the server */
  roots: readonly Root[];
  /** Model for sampling requests; omit to not advertise sampling */
  sampling?: ModelBackend;
  /** What to do with a second elicitation while one is outstanding (default: queue) */
  elicitationPolicy?: ElicitationPolicy;
  /** How long an active elicitation waits for an answer (default: 10 minutes) */
  elicitationTimeoutMs?: number;
  /** Handshake timeout (default: 30s) */
  handshakeTimeoutMs?: number;
  /** Default per-call timeout (default: 5 minutes) */
  requestTimeoutMs?: number;
  /** Files that must exist before launching (e.g. the server script) */
  requiredPaths?: string[];
  /** Name and version reported to the server */
  clientInfo?: Implementation;
  logger?: StructuredLogger;
  tracker?: RequestTracker;
  transportFactory?: TransportFactory;
  /** Called when an elicitation becomes the one awaiting an answer */
  onElicitation?: (pending: PendingElicitation) => void;
  /** Called when the server reports its tool list changed (the catalog is NOT refreshed) */
  onToolListChanged?: () => void;
  /** Called when the session status changes */
  onStatusChange?: (status: SessionStatus) => void;
  /** Called for each line the server writes to stderr */
  onServerStderr?: (line: string) => void;
}

/**
 * Launch a tool server and complete the MCP handshake.
 *
 * @throws ConnectionError if the server cannot be started
 * @throws HandshakeError if initialization fails or times out
 */
export async function connect(options: SessionOptions): Promise<ToolSession> {
  const session = new ToolSession(options);
  await session.open();
  return session;
}

export class ToolSession implements ToolInvoker {
  private readonly options: SessionOptions;
  private readonly logger: StructuredLogger;
  private readonly tracker: RequestTracker;
  private readonly catalog: ToolCatalog;
  private readonly slot: ElicitationSlot;
  private readonly callbacks: CallbackTable;
  private readonly requestTimeoutMs: number;

  private client: Client | null = null;
  private status: SessionStatus = "disconnected";
  private opened = false;
  // Ordering only: errors reach each caller through its own promise
  private chain: Promise<void> = Promise.resolve();
  private stderrBuffer: string[] = [];

  constructor(options: SessionOptions) {
    this.options = options;
    this.logger = options.logger ?? createNullLogger();
    this.tracker = options.tracker ?? new RequestTracker({ logger: this.logger });
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    this.catalog = new ToolCatalog(() => this.fetchTools(), this.logger);
    this.slot = new ElicitationSlot({
      policy: options.elicitationPolicy ?? "queue",
      ...(options.elicitationTimeoutMs !== undefined ? { timeoutMs: options.elicitationTimeoutMs } : {}),
      onActivate: options.onElicitation,
      logger: this.logger,
    });
    this.callbacks = {
      roots: new RootsHandler(options.roots),
      ...(options.sampling ? { sampling: new SamplingHandler(options.sampling, this.logger) } : {}),
      elicitation: new ElicitationHandler(this.slot, this.logger),
    };
  }

  // ---------------------------------------------------------------------------
  // Connection Management
  // ---------------------------------------------------------------------------

  /**
   * Start the server and perform the handshake. A session opens once.
   */
  public async open(): Promise<void> {
    if (this.opened) {
      throw new Error("Session has already been opened");
    }
    this.opened = true;

    const { command, requiredPaths = [], cwd } = this.options;
    if (!this.options.transportFactory) {
      assertCommandExists(command, cwd);
    }
    assertPathsExist(command, requiredPaths, cwd);

    this.setStatus("connecting");
    const transport = this.createTransport();
    const client = new Client(this.options.clientInfo ?? DEFAULT_CLIENT_INFO, {
      capabilities: callbackCapabilities(this.callbacks),
    });

    registerCallbacks(client, this.callbacks, this.tracker);
    client.setNotificationHandler(ToolListChangedNotificationSchema, () => {
      this.logger.info("tool_list_changed", {});
      this.options.onToolListChanged?.();
    });
    client.onclose = (): void => {
      this.handleTransportClosed();
    };
    client.onerror = (error): void => {
      this.logger.warn("transport_error", { error: error.message });
    };

    try {
      await client.connect(transport, {
        timeout: this.options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
      });
    } catch (err) {
      this.setStatus("closed");
      await client.close().catch((closeErr: unknown) => {
        this.logger.debug("handshake_cleanup_failed", { error: errorMessage(closeErr) });
      });
      throw this.classifyConnectError(err);
    }

    this.client = client;
    const stderr = "stderr" in transport && transport.stderr instanceof Stream ? transport.stderr : null;
    if (stderr) {
      this.setupStderrCapture(stderr);
    }
    this.setStatus("connected");

    const server = client.getServerVersion();
    this.logger.info("session_connected", {
      command,
      server: server?.name,
      serverVersion: server?.version,
      pid: transport instanceof StdioClientTransport ? transport.pid : undefined,
    });
  }

  /**
   * Shut the session down. Safe to call more than once and after the
   * connection dropped. An in-flight call fails with TransportError.
   */
  public async close(): Promise<void> {
    if (this.status === "closed") {
      return;
    }

    const client = this.client;
    this.client = null;
    this.setStatus("closed");
    this.slot.shutdown("Session closed");
    this.catalog.clear();

    if (client) {
      try {
        await client.close();
      } catch (err) {
        this.logger.warn("session_close_failed", { error: errorMessage(err) });
      }
    }

    this.logger.info("session_closed", {});
  }

  // ---------------------------------------------------------------------------
  // Status & Information
  // ---------------------------------------------------------------------------

  public getStatus(): SessionStatus {
    return this.status;
  }

  public isConnected(): boolean {
    return this.status === "connected";
  }

  /**
   * Name and version the server reported in the handshake
   */
  public getServerInfo(): Implementation | undefined {
    return this.client?.getServerVersion();
  }

  public getRoots(): readonly Root[] {
    return this.callbacks.roots.list();
  }

  public getHistory(): TrackedRequest[] {
    return this.tracker.getAllRequests();
  }

  /**
   * The most recent lines the server wrote to stderr, oldest first
   */
  public getStderrBuffer(): string[] {
    return [...this.stderrBuffer];
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  /**
   * Cached tool catalog; fetched on first use or when forced.
   */
  public async listTools(options: { forceRefresh?: boolean } = {}): Promise<readonly ToolDescriptor[]> {
    this.assertOpen();
    return this.catalog.list(options);
  }

  /**
   * Call a tool from the catalog.
   *
   * @throws UnknownToolError if the tool is not in the cached catalog (nothing is sent)
   * @throws TransportError if the channel fails or the call times out
   */
  public async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: CallOptions = {}
  ): Promise<ToolInvocationResult> {
    this.assertOpen();
    if (!this.catalog.isLoaded()) {
      await this.catalog.list();
    }
    if (!this.catalog.has(name)) {
      this.logger.warn("unknown_tool", { tool: name });
      throw new UnknownToolError(name);
    }

    return this.exclusive(async () => {
      const client = this.getConnectedClient();
      const requestId = this.tracker.startRequest("tool_call", name);
      this.logger.debug("tool_call_started", { tool: name, requestId });

      let raw: unknown;
      try {
        raw = await client.callTool({ name, arguments: args }, CallToolResultSchema, {
          timeout: options.timeoutMs ?? this.requestTimeoutMs,
        });
      } catch (err) {
        const transportError = this.toTransportError(err, requestId);
        if (transportError) {
          throw transportError;
        }
        if (err instanceof McpError) {
          // The server answered with an error response
          this.tracker.failRequest(requestId, err.message);
          this.logger.info("tool_call_rejected", { tool: name, code: err.code, error: err.message });
          return {
            ok: false,
            toolName: name,
            error: { source: "protocol", message: err.message, code: err.code },
          };
        }
        throw this.failed(err, requestId);
      }

      const result = unwrapToolResult(name, raw);
      if (result.ok) {
        this.tracker.completeRequest(requestId, formatToolResult(result));
        this.logger.debug("tool_call_completed", { tool: name, requestId });
      } else {
        this.tracker.failRequest(requestId, result.error.message);
        this.logger.info("tool_call_failed", { tool: name, error: result.error.message });
      }
      return result;
    });
  }

  // ---------------------------------------------------------------------------
  // Resources
  // ---------------------------------------------------------------------------

  public async listResources(options: CallOptions = {}): Promise<Resource[]> {
    this.assertOpen();
    return this.exclusive(async () => {
      const client = this.getConnectedClient();
      if (client.getServerCapabilities()?.resources === undefined) {
        return [];
      }

      const requestId = this.tracker.startRequest("resource_list", "resources/list");
      try {
        const resources: Resource[] = [];
        let cursor: string | undefined;
        do {
          const page = await client.listResources(cursor !== undefined ? { cursor } : undefined, {
            timeout: options.timeoutMs ?? this.requestTimeoutMs,
          });
          resources.push(...page.resources);
          cursor = page.nextCursor;
        } while (cursor !== undefined);

        this.tracker.completeRequest(requestId, `${String(resources.length)} resources`);
        return resources;
      } catch (err) {
        throw this.toTransportError(err, requestId) ?? this.failed(err, requestId);
      }
    });
  }

  public async readResource(uri: string, options: CallOptions = {}): Promise<ReadResourceResult> {
    this.assertOpen();
    return this.exclusive(async () => {
      const client = this.getConnectedClient();
      const requestId = this.tracker.startRequest("resource_read", uri);
      try {
        const result = await client.readResource(
          { uri },
          { timeout: options.timeoutMs ?? this.requestTimeoutMs }
        );
        this.tracker.completeRequest(requestId, `${String(result.contents.length)} contents`);
        return result;
      } catch (err) {
        throw this.toTransportError(err, requestId) ?? this.failed(err, requestId);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Elicitation
  // ---------------------------------------------------------------------------

  public getPendingElicitation(): PendingElicitation | null {
    return this.slot.current();
  }

  public getQueuedElicitationCount(): number {
    return this.slot.queuedCount();
  }

  /**
   * Answer the pending elicitation.
   *
   * @throws UnknownRequestError if the ID does not match the pending request
   */
  public respondElicitation(text: string, requestId?: string): PendingElicitation {
    return this.slot.respond(text, requestId);
  }

  /**
   * Decline to answer the pending elicitation.
   *
   * @throws UnknownRequestError if the ID does not match the pending request
   */
  public cancelElicitation(requestId?: string): PendingElicitation {
    return this.slot.cancel(requestId);
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private createTransport(): Transport {
    const launch: SessionLaunch = {
      command: this.options.command,
      args: this.options.args ?? [],
      env: this.options.env,
      cwd: this.options.cwd,
    };

    if (this.options.transportFactory) {
      return this.options.transportFactory(launch);
    }

    return new StdioClientTransport({
      command: launch.command,
      args: launch.args,
      env: { ...getDefaultEnvironment(), ...launch.env },
      cwd: launch.cwd,
      stderr: "pipe",
    });
  }

  private async fetchTools(): Promise<ToolDescriptor[]> {
    return this.exclusive(async () => {
      const client = this.getConnectedClient();
      if (client.getServerCapabilities()?.tools === undefined) {
        return [];
      }

      const requestId = this.tracker.startRequest("tool_list", "tools/list");
      try {
        const tools: ToolDescriptor[] = [];
        let cursor: string | undefined;
        do {
          const page = await client.listTools(cursor !== undefined ? { cursor } : undefined, {
            timeout: this.requestTimeoutMs,
          });
          for (const tool of page.tools) {
            tools.push({
              name: tool.name,
              description: tool.description ?? "",
              inputSchema: tool.inputSchema,
            });
          }
          cursor = page.nextCursor;
        } while (cursor !== undefined);

        this.tracker.completeRequest(requestId, `${String(tools.length)} tools`);
        return tools;
      } catch (err) {
        throw this.toTransportError(err, requestId) ?? this.failed(err, requestId);
      }
    });
  }

  /**
   * Run a request after every previously queued one has settled.
   */
  private exclusive<T>(run: () => Promise<T>): Promise<T> {
    const next = this.chain.then(run);
    this.chain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private setupStderrCapture(stderr: Stream): void {
    stderr.on("data", (chunk: Buffer) => {
      const lines = chunk
        .toString()
        .split("\n")
        .filter((line) => line.trim());

      for (const line of lines) {
        this.stderrBuffer.push(line);
        if (this.stderrBuffer.length > MAX_STDERR_LINES) {
          this.stderrBuffer.shift();
        }
        this.logger.debug("server_stderr", { line });
        this.options.onServerStderr?.(line);
      }
    });
  }

  private handleTransportClosed(): void {
    if (this.status === "closed" || this.status === "connecting") {
      return;
    }
    this.client = null;
    this.setStatus("disconnected");
    this.slot.shutdown("Connection to the tool server was lost");
    this.logger.warn("transport_closed", {});
  }

  private classifyConnectError(err: unknown): Error {
    const { command } = this.options;

    if (isSpawnError(err)) {
      return new ConnectionError(`Failed to start '${command}': ${err.message}`, command, {
        cause: err,
      });
    }
    if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
      return new HandshakeError(`Server did not complete initialization: ${err.message}`, true, {
        cause: err,
      });
    }
    return new HandshakeError(`Initialization failed: ${errorMessage(err)}`, false, { cause: err });
  }

  /**
   * Map channel-level failures to TransportError (and record them).
   * Returns undefined for anything else.
   */
  private toTransportError(err: unknown, requestId: string): TransportError | undefined {
    if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
      this.tracker.timeoutRequest(requestId);
      return new TransportError(`Request timed out: ${err.message}`, "timeout", { cause: err });
    }
    if (err instanceof McpError && err.code === ErrorCode.ConnectionClosed) {
      this.tracker.failRequest(requestId, err.message);
      return new TransportError("Connection to the tool server closed", "closed", { cause: err });
    }
    if (!(err instanceof McpError)) {
      this.tracker.failRequest(requestId, errorMessage(err));
      return new TransportError(`Failed to send request: ${errorMessage(err)}`, "send_failed", {
        cause: err,
      });
    }
    return undefined;
  }

  private failed(err: unknown, requestId: string): unknown {
    this.tracker.failRequest(requestId, errorMessage(err));
    return err;
  }

  private assertOpen(): void {
    if (this.status !== "connected") {
      throw new TransportError(`Session is ${this.status}`, "closed");
    }
  }

  private getConnectedClient(): Client {
    if (this.status !== "connected" || !this.client) {
      throw new TransportError(`Session is ${this.status}`, "closed");
    }
    return this.client;
  }

  private setStatus(status: SessionStatus): void {
    if (this.status === status) return;
    this.status = status;
    this.options.onStatusChange?.(status);
  }
}

function isSpawnError(err: unknown): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    SPAWN_ERROR_CODES.has(err.code)
  );
}

