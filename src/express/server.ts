// src/express/server.ts
import cors from "cors";
import express from "express";
import http from "node:http";
import type net from "node:net";

import { TaskManager } from "../core/TaskManager";
import type { ReadableChannel } from "../core/AsyncChannel";
import { loadServerConfig, type ServerConfig } from "../config";
import { A2AError, errorMessage } from "../errors";
import type { TaskProcessor } from "../interfaces/processor";
import type { TaskStore } from "../interfaces/TaskStore";
import { createLogger, type Logger } from "../logger";
import { zJsonRpcRequest } from "../schemas";
import { pipeTaskEvents, startSseResponse } from "../sse/SseResponseWriter";
import {
  A2AErrorCodes,
  A2AMethods,
  type AgentCard,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcSuccessResponse,
  type TaskEvent,
} from "../types";

const log = createLogger("server");

// --- Handler Creation --- //

export interface A2AExpressHandlerOptions {
  keepAliveIntervalMs: number;
  /** Served on the agent card route; `capabilities.streaming === false` disables the streaming methods. */
  agentCard?: AgentCard;
  logger?: Logger;
}

export interface A2AExpressHandlers {
  a2aRpcHandler: express.RequestHandler;
  agentCardHandler: express.RequestHandler;
  /** Answers body-parser JSON syntax errors with a -32700 response. */
  jsonParseErrorHandler: express.ErrorRequestHandler;
}

type UnaryHandler = (params: unknown) => Promise<unknown>;

/**
 * Creates the Express request handlers that put the JSON-RPC surface on top of a
 * TaskManager.
 */
export function createA2AExpressHandlers(manager: TaskManager, options: A2AExpressHandlerOptions): A2AExpressHandlers {
  const handlerLog = options.logger ?? log;
  const streamingEnabled = options.agentCard?.capabilities.streaming !== false;

  const unary = new Map<string, UnaryHandler>([
    [A2AMethods.SendTask, (params) => manager.sendTask(params)],
    [A2AMethods.GetTask, (params) => manager.getTask(params)],
    [A2AMethods.CancelTask, (params) => manager.cancelTask(params)],
    [A2AMethods.SetPushNotification, (params) => manager.setPushNotification(params)],
    [A2AMethods.GetPushNotification, (params) => manager.getPushNotification(params)],
  ]);

  const dispatch = async (req: express.Request, res: express.Response): Promise<void> => {
    if (!req.is("application/json")) {
      sendError(res, null, new A2AError(A2AErrorCodes.InvalidRequest, "Unsupported Media Type: Content-Type must be application/json"), 415);
      return;
    }

    let requestId: JsonRpcId = null;
    try {
      const parsed = zJsonRpcRequest.safeParse(req.body);
      if (!parsed.success) throw A2AError.invalidRequest(parsed.error.issues);
      const { method, params } = parsed.data;
      requestId = parsed.data.id ?? null;

      if (method === A2AMethods.SendTaskSubscribe || method === A2AMethods.Resubscribe) {
        if (!streamingEnabled) {
          throw new A2AError(A2AErrorCodes.UnsupportedOperation, `Method ${method} requires streaming capability, which is not supported.`);
        }
        // The manager validates and may throw before any SSE header is written
        const abort = new AbortController();
        const onEarlyClose = () => abort.abort();
        res.once("close", onEarlyClose);
        let channel: ReadableChannel<TaskEvent>;
        try {
          channel =
            method === A2AMethods.SendTaskSubscribe
              ? await manager.sendTaskSubscribe(params, abort.signal)
              : await manager.resubscribe(params, abort.signal);
        } finally {
          res.off("close", onEarlyClose);
        }
        if (abort.signal.aborted) {
          // the aborted signal has already released the subscription
          handlerLog.info({ requestId }, "Client disconnected before the event stream started");
          return;
        }

        startSseResponse(res);
        await pipeTaskEvents(taskIdOf(params), channel, res, abort, {
          keepAliveIntervalMs: options.keepAliveIntervalMs,
          logger: handlerLog,
        });
        return;
      }

      const handler = unary.get(method);
      if (!handler) throw A2AError.methodNotFound(method);

      const result = await handler(params);
      const response: JsonRpcSuccessResponse = { jsonrpc: "2.0", id: requestId, result };
      res.status(200).json(response);
    } catch (err) {
      const error = toA2AError(err);
      if (error.code === A2AErrorCodes.InternalError) {
        handlerLog.error({ err, requestId }, "Error processing request");
      } else {
        handlerLog.info({ code: error.code, requestId }, "Request rejected");
      }

      if (!res.headersSent) {
        sendError(res, requestId, error);
      } else {
        handlerLog.error({ requestId }, "Error occurred after SSE headers were sent; ending stream");
        if (!res.writableEnded) res.end();
      }
    }
  };

  const a2aRpcHandler: express.RequestHandler = (req, res, next) => {
    dispatch(req, res).catch(next);
  };

  const agentCardHandler: express.RequestHandler = (_req, res) => {
    if (!options.agentCard) {
      res.status(404).json({ error: "No agent card configured" });
      return;
    }
    res.json(options.agentCard);
  };

  const jsonParseErrorHandler: express.ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof SyntaxError && !res.headersSent) {
      sendError(res, null, A2AError.parseError(err.message));
      return;
    }
    next(err);
  };

  return { a2aRpcHandler, agentCardHandler, jsonParseErrorHandler };
}

// --- Server Setup --- //

export interface A2AServerOptions extends Partial<ServerConfig> {
  processor: TaskProcessor;
  taskStore?: TaskStore;
  /** Served at `agentCardPath`; its `url` is set to the RPC endpoint. */
  agentCard?: Omit<AgentCard, "url">;
  /** Runs before the RPC handler, e.g. to authenticate callers. */
  middleware?: express.RequestHandler[];
  /** Registers extra routes on the app after the A2A routes, e.g. health checks. */
  configureApp?: (app: express.Express, manager: TaskManager) => void;
  /** Install SIGINT/SIGTERM handlers that close the server and exit. Defaults to true. */
  handleSignals?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface A2AServerHandle {
  app: express.Express;
  server: http.Server;
  manager: TaskManager;
  config: ServerConfig;
  /** Full URL of the JSON-RPC endpoint, using the bound port. */
  url: string;
  close(): Promise<void>;
}

export async function startA2AExpressServer(options: A2AServerOptions): Promise<A2AServerHandle> {
  const {
    processor,
    taskStore,
    agentCard: agentDefinition,
    middleware = [],
    configureApp,
    handleSignals = true,
    env = process.env,
    ...overrides
  } = options;
  const config = loadServerConfig(env, overrides);

  const manager = new TaskManager({
    processor,
    taskStore,
    subscriberBufferSize: config.subscriberBufferSize,
  });

  // --- Express app --- //
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));

  const server = http.createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === "object" ? address.port : config.port;
  const baseUrl = config.port === 0 ? `http://${config.host}:${boundPort}` : config.baseUrl;
  const url = `${baseUrl}${config.rpcPath}`;
  const agentCard: AgentCard | undefined = agentDefinition ? { ...agentDefinition, url } : undefined;

  const { a2aRpcHandler, agentCardHandler, jsonParseErrorHandler } = createA2AExpressHandlers(manager, {
    keepAliveIntervalMs: config.keepAliveIntervalMs,
    agentCard,
  });

  if (agentCard) app.get(config.agentCardPath, agentCardHandler);
  app.post(config.rpcPath, ...middleware, a2aRpcHandler);
  app.use(jsonParseErrorHandler);
  if (configureApp) configureApp(app, manager);

  log.info(
    { url, agentCard: agentCard ? `${baseUrl}${config.agentCardPath}` : undefined, port: boundPort },
    "A2A server listening",
  );

  // --- Graceful Shutdown --- //
  const connections = new Set<net.Socket>();
  server.on("connection", (conn) => {
    connections.add(conn);
    conn.on("close", () => connections.delete(conn));
  });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) closing = shutdown();
    return closing;
  };

  const shutdown = async (): Promise<void> => {
    log.info({ connections: connections.size }, "Shutting down A2A server");
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    // Ends every SSE stream through its subscriber channel
    await manager.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      for (const conn of connections) conn.destroy();
    });
    log.info("A2A server closed");
  };

  const onSignal = (signal: NodeJS.Signals) => {
    log.info({ signal }, "Received signal, starting graceful shutdown");
    const failsafe = setTimeout(() => {
      log.error("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, 10000).unref();
    close().then(
      () => {
        clearTimeout(failsafe);
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, "Error during graceful shutdown");
        clearTimeout(failsafe);
        process.exit(1);
      },
    );
  };

  if (handleSignals) {
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  }

  return { app, server, manager, config, url, close };
}

// --- Helper Functions --- //

function toA2AError(err: unknown): A2AError {
  if (err instanceof A2AError) return err;
  return A2AError.internal(errorMessage(err));
}

function sendError(res: express.Response, id: JsonRpcId, error: A2AError, status = statusForErrorCode(error.code)): void {
  const response: JsonRpcErrorResponse = { jsonrpc: "2.0", id, error: error.toJsonRpcError() };
  res.status(status).json(response);
}

export function statusForErrorCode(code: number): number {
  switch (code) {
    case A2AErrorCodes.ParseError:
    case A2AErrorCodes.InvalidRequest:
    case A2AErrorCodes.InvalidParams:
      return 400;
    case A2AErrorCodes.MethodNotFound:
    case A2AErrorCodes.TaskNotFound:
      return 404;
    default:
      return 500;
  }
}

function taskIdOf(params: unknown): string {
  if (typeof params === "object" && params !== null && "id" in params && typeof params.id === "string") {
    return params.id;
  }
  return "";
}
