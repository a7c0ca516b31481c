#!/usr/bin/env node
/**
 * Interactive client shell.
 *
 * Starts the article server, connects to it, then reads commands from
 * stdin. Tool calls run in the background so that an elicitation raised by
 * the server mid-call can be answered from the same prompt.
 */

import "dotenv/config";
import { createInterface } from "readline";

import { ArticleAgent } from "./article-agent.js";
import { HELP_TEXT, WHILE_BUSY, parseCommand, type ShellCommand } from "./commands.js";
import { buildLaunchOptions, loadConfig } from "./config.js";
import { DispatchLoop } from "./dispatch/index.js";
import { describeFailure } from "./errors.js";
import { formatToolResult } from "./invoke.js";
import {
  createConsoleLogger,
  createFileLogger,
  isLogLevel,
  type LogLevel,
  type StructuredLogger,
} from "./logging.js";
import { BedrockModelBackend } from "./model/bedrock-backend.js";
import { connect, type ToolSession } from "./session.js";
import type { ElicitationPolicy, PendingElicitation } from "./types.js";

const STDERR_TAIL_LINES = 20;

interface CliArgs {
  logLevel?: LogLevel;
  logFile?: string;
  policy?: ElicitationPolicy;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {};

  const take = (flag: string, i: number): [string | undefined, number] => {
    const arg = args[i] ?? "";
    if (arg === flag) {
      return [args[i + 1], i + 1];
    }
    if (arg.startsWith(`${flag}=`)) {
      return [arg.slice(flag.length + 1), i];
    }
    return [undefined, i];
  };

  for (let i = 0; i < args.length; i++) {
    let value: string | undefined;
    let next: number;

    [value, next] = take("--log-level", i);
    if (value !== undefined) {
      if (!isLogLevel(value)) {
        throw new Error(`Invalid --log-level '${value}'`);
      }
      parsed.logLevel = value;
      i = next;
      continue;
    }

    [value, next] = take("--log-file", i);
    if (value !== undefined) {
      parsed.logFile = value;
      i = next;
      continue;
    }

    [value, next] = take("--policy", i);
    if (value !== undefined) {
      if (value !== "queue" && value !== "reject") {
        throw new Error(`Invalid --policy '${value}' (expected queue or reject)`);
      }
      parsed.policy = value;
      i = next;
      continue;
    }

    throw new Error(`Unknown argument '${args[i] ?? ""}'`);
  }

  return parsed;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printFailure(err: unknown): void {
  console.log(describeFailure(err).message);
}

function describePending(pending: PendingElicitation): string {
  const fields = Object.keys(pending.requestedSchema.properties);
  return [
    `Server asks [${pending.requestId}]: ${pending.prompt}`,
    fields.length > 0 ? `  fields: ${fields.join(", ")}` : "",
    "  answer with 'reply <text>' or 'cancel'",
  ]
    .filter(Boolean)
    .join("\n");
}

class Shell {
  private busy = false;

  constructor(
    private readonly session: ToolSession,
    private readonly dispatch: DispatchLoop,
    private readonly agent: ArticleAgent,
    private readonly logger: StructuredLogger
  ) {}

  /**
   * Handle one line. Returns false when the shell should exit.
   */
  public handle(line: string): boolean {
    const command = parseCommand(line);

    if (this.busy && !WHILE_BUSY.has(command.kind)) {
      console.log("A request is still running; only 'pending', 'reply' and 'cancel' are available.");
      return true;
    }

    switch (command.kind) {
      case "empty":
        return true;
      case "quit":
        return false;
      case "help":
        console.log(HELP_TEXT);
        return true;
      case "invalid":
        console.log(command.message);
        return true;
      case "roots":
        for (const root of this.session.getRoots()) {
          console.log(`${root.name}: ${root.uri}`);
        }
        return true;
      case "pending":
        this.showPending();
        return true;
      case "reply":
        this.settle(() => this.session.respondElicitation(command.text));
        return true;
      case "cancel":
        this.settle(() => this.session.cancelElicitation());
        return true;
      case "history":
        for (const req of this.session.getHistory()) {
          const took = req.durationMs !== undefined ? ` ${String(req.durationMs)}ms` : "";
          const detail = req.error ?? req.resultSummary ?? "";
          console.log(`${req.startedAt.toISOString()} ${req.type} ${req.name} ${req.status}${took} ${detail}`.trimEnd());
        }
        return true;
      default:
        this.background(command);
        return true;
    }
  }

  private showPending(): void {
    const pending = this.session.getPendingElicitation();
    if (!pending) {
      console.log("No elicitation is pending.");
      return;
    }
    console.log(describePending(pending));
    const queued = this.session.getQueuedElicitationCount();
    if (queued > 0) {
      console.log(`  (${String(queued)} more waiting)`);
    }
  }

  private settle(action: () => PendingElicitation): void {
    try {
      const settled = action();
      console.log(`Settled elicitation ${settled.requestId}.`);
    } catch (err) {
      printFailure(err);
    }
  }

  private background(command: ShellCommand): void {
    this.busy = true;
    void this.run(command)
      .catch((err: unknown) => {
        this.logger.debug("command_failed", { command: command.kind, error: describeFailure(err).category });
        printFailure(err);
      })
      .finally(() => {
        this.busy = false;
      });
  }

  private async run(command: ShellCommand): Promise<void> {
    switch (command.kind) {
      case "tools":
      case "refresh": {
        const tools = await this.session.listTools({ forceRefresh: command.kind === "refresh" });
        if (tools.length === 0) {
          console.log("(no tools available)");
        }
        for (const tool of tools) {
          console.log(`${tool.name}: ${tool.description || "(no description)"}`);
        }
        return;
      }
      case "call": {
        const result = await this.session.callTool(command.tool, command.args);
        console.log(formatToolResult(result));
        return;
      }
      case "ask": {
        const outcome = await this.dispatch.run(command.text);
        console.log(`[${outcome.toolName}] ${outcome.narration}`);
        return;
      }
      case "search": {
        printJson(await this.agent.searchArticles({ allFields: command.text }));
        return;
      }
      default:
        return;
    }
  }
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadConfig();
  const logLevel = args.logLevel ?? config.logLevel;
  const logger = args.logFile ? createFileLogger(logLevel, args.logFile) : createConsoleLogger(logLevel);

  const model = new BedrockModelBackend({ ...config.model, logger });
  const launch = buildLaunchOptions(config);

  logger.info("client_starting", { command: launch.command, args: launch.args, modelId: model.modelId });

  const session = await connect({
    ...launch,
    elicitationPolicy: args.policy ?? launch.elicitationPolicy,
    sampling: model,
    logger,
    onElicitation: (pending) => {
      console.log(`\n${describePending(pending)}`);
    },
    onToolListChanged: () => {
      console.log("\nThe server's tool list changed; run 'refresh' to reload it.");
    },
    onStatusChange: (status) => {
      if (status === "disconnected") {
        console.log("\nConnection to the tool server was lost.");
        const tail = session.getStderrBuffer().slice(-STDERR_TAIL_LINES);
        if (tail.length > 0) {
          console.log(`Last server output:\n${tail.map((line) => `  ${line}`).join("\n")}`);
        }
      }
    },
  });

  const server = session.getServerInfo();
  console.log(`Connected to ${server?.name ?? "tool server"} ${server?.version ?? ""}`.trimEnd());
  console.log("Type 'help' for commands.");

  const shell = new Shell(
    session,
    new DispatchLoop({ invoker: session, model, logger }),
    new ArticleAgent(session),
    logger
  );

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });

  let closing = false;
  const shutdown = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    logger.info("client_shutting_down", {});
    rl.close();
    await session.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  rl.on("line", (line) => {
    if (!shell.handle(line)) {
      void shutdown();
      return;
    }
    rl.prompt();
  });
  rl.on("close", () => void shutdown());
  rl.prompt();
}

main().catch((err: unknown) => {
  console.error(describeFailure(err).message);
  process.exit(1);
});
