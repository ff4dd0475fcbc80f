import { randomUUID } from "node:crypto";
import type { Logger } from "tslog";
import WebSocket from "ws";
import { BackendDisconnectedError } from "./errors.js";
import { PendingRequests, ReplyFuture } from "./pending.js";
import type { MessageTypeName, ProtocolSchema } from "./schema.js";

/**
 * The single long-lived duplex channel to the validator. Every frame is
 * a `Message` envelope; replies are routed back to their waiter by
 * correlation id, regardless of the order they arrive in.
 */

export type ConnectionState = "connecting" | "connected" | "disconnected" | "closed";

/** What request handlers need from a connection. */
export interface BackendSender {
  send(messageType: MessageTypeName, content: Uint8Array): ReplyFuture;
}

export interface BackendConnectionOptions {
  url: string;
  schema: ProtocolSchema;
  logger: Logger<unknown>;
  /** Delay before reopening a dropped socket. Default: 1000 */
  reconnectDelayMs?: number;
  onStateChange?: (state: ConnectionState) => void;
}

interface OutboundFrame {
  correlationId: string;
  bytes: Uint8Array;
}

export class BackendConnection implements BackendSender {
  private readonly url: string;
  private readonly schema: ProtocolSchema;
  private readonly logger: Logger<unknown>;
  private readonly reconnectDelayMs: number;
  private readonly onStateChange?: (state: ConnectionState) => void;

  private readonly pending = new PendingRequests();
  private outbox: OutboundFrame[] = [];
  private socket: WebSocket | undefined;
  private reconnectTimer: ReturnType<typeof setTimeout> | undefined;
  private currentState: ConnectionState = "disconnected";

  constructor(options: BackendConnectionOptions) {
    this.url = options.url;
    this.schema = options.schema;
    this.logger = options.logger;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1000;
    this.onStateChange = options.onStateChange;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Number of requests still waiting for a reply. */
  get outstanding(): number {
    return this.pending.size;
  }

  /** Start connecting. Further reconnects happen on their own until close(). */
  open(): void {
    if (this.currentState === "closed") {
      throw new Error("Backend connection has been closed");
    }
    if (this.socket) return;
    this.connect();
  }

  send(messageType: MessageTypeName, content: Uint8Array): ReplyFuture {
    if (this.currentState === "closed") {
      const future = new ReplyFuture(this.nextCorrelationId());
      future.fail(new BackendDisconnectedError("Backend connection has been closed"));
      return future;
    }

    const correlationId = this.nextCorrelationId();
    const future = this.pending.create(correlationId);
    const bytes = this.schema.encode("Message", {
      message_type: this.schema.messageType(messageType),
      correlation_id: correlationId,
      content,
    });

    const frame = { correlationId, bytes };
    if (this.socket?.readyState === WebSocket.OPEN) {
      this.write(this.socket, frame);
    } else {
      this.outbox.push(frame);
    }
    return future;
  }

  async close(): Promise<void> {
    if (this.currentState === "closed") return;
    this.setState("closed");
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;
    this.outbox = [];
    this.pending.failAll(new BackendDisconnectedError("Backend connection has been closed"));

    const socket = this.socket;
    this.socket = undefined;
    if (!socket || socket.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      } else {
        socket.close(1000, "Gateway shutting down");
      }
    });
  }

  private nextCorrelationId(): string {
    let id = randomUUID();
    while (this.pending.has(id)) id = randomUUID();
    return id;
  }

  private connect(): void {
    this.setState("connecting");
    const socket = new WebSocket(this.url);
    socket.binaryType = "nodebuffer";
    this.socket = socket;

    socket.on("open", () => {
      this.logger.info(`Connected to validator at ${this.url}`);
      this.setState("connected");
      const queued = this.outbox;
      this.outbox = [];
      for (const frame of queued) this.write(socket, frame);
    });

    socket.on("message", (data: WebSocket.RawData) => {
      this.receive(toBytes(data));
    });

    socket.on("error", (err: Error) => {
      this.logger.warn(`Validator connection error: ${err.message}`);
    });

    socket.on("close", (code: number) => {
      if (this.socket !== socket) return;
      this.socket = undefined;
      this.handleDisconnect(code);
    });
  }

  private write(socket: WebSocket, frame: OutboundFrame): void {
    socket.send(frame.bytes, { binary: true }, (err) => {
      if (err) {
        this.logger.warn(`Failed to send ${frame.correlationId}: ${err.message}`);
        this.pending.fail(
          frame.correlationId,
          new BackendDisconnectedError(`Failed to send request: ${err.message}`),
        );
      }
    });
  }

  private receive(bytes: Uint8Array): void {
    let correlationId: string;
    let content: Uint8Array;
    try {
      const message = this.schema.toObject("Message", this.schema.decode("Message", bytes), {
        defaults: true,
        bytes: Uint8Array,
      });
      correlationId = typeof message.correlation_id === "string" ? message.correlation_id : "";
      content = message.content instanceof Uint8Array ? message.content : new Uint8Array(0);
    } catch (err) {
      this.logger.warn("Dropping undecodable frame from validator:", err);
      return;
    }

    if (!this.pending.fulfill(correlationId, content)) {
      this.logger.debug(`Dropping reply with unknown correlation id: ${correlationId}`);
    }
  }

  private handleDisconnect(code: number): void {
    if (this.currentState === "closed") return;

    this.outbox = [];
    const failed = this.pending.failAll(new BackendDisconnectedError());
    this.setState("disconnected");
    this.logger.warn(
      `Validator connection closed (code ${code}); failed ${failed} pending request(s), ` +
        `reconnecting in ${this.reconnectDelayMs}ms`,
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.currentState !== "closed") this.connect();
    }, this.reconnectDelayMs);
  }

  private setState(state: ConnectionState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.onStateChange?.(state);
  }
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}
