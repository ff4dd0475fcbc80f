import { BackendClient } from "../backend/client.js";
import type { BackendSender } from "../backend/connection.js";
import { ReplyFuture } from "../backend/pending.js";
import {
  JSON_CONVERSION,
  loadProtocolSchema,
  type MessageTypeName,
  type ProtocolSchema,
  type ReplyTypeName,
} from "../backend/schema.js";
import { HeaderExpander } from "../gateway/headers.js";
import type { RouteContext } from "../gateway/routes/context.js";
import { createLogger } from "../infra/logger.js";

export interface SentRequest {
  messageType: MessageTypeName;
  content: Record<string, unknown>;
}

type Scripted =
  | { kind: "reply"; bytes: Uint8Array }
  | { kind: "fail"; error: Error }
  | { kind: "silent" };

/**
 * In-process stand-in for the validator connection. Each request type
 * answers with whatever was scripted for it; unscripted requests are
 * left waiting.
 */
export class FakeValidator implements BackendSender {
  readonly sent: SentRequest[] = [];
  private readonly scripts = new Map<MessageTypeName, Scripted>();
  private nextId = 0;

  constructor(readonly schema: ProtocolSchema = loadProtocolSchema()) {}

  reply(messageType: MessageTypeName, replyType: ReplyTypeName, value: Record<string, unknown>): this {
    this.scripts.set(messageType, { kind: "reply", bytes: this.schema.encode(replyType, value) });
    return this;
  }

  replyBytes(messageType: MessageTypeName, bytes: Uint8Array): this {
    this.scripts.set(messageType, { kind: "reply", bytes });
    return this;
  }

  fail(messageType: MessageTypeName, error: Error): this {
    this.scripts.set(messageType, { kind: "fail", error });
    return this;
  }

  /** The last request of a type, decoded. */
  lastSent(messageType: MessageTypeName): Record<string, unknown> | undefined {
    return this.sent.filter((request) => request.messageType === messageType).at(-1)?.content;
  }

  send(messageType: MessageTypeName, content: Uint8Array): ReplyFuture {
    const requestType = requestMessageName(messageType);
    this.sent.push({
      messageType,
      content: this.schema.toObject(requestType, this.schema.decode(requestType, content), {
        ...JSON_CONVERSION,
        defaults: false,
      }),
    });

    const future = new ReplyFuture(`fake-${++this.nextId}`);
    const script = this.scripts.get(messageType) ?? { kind: "silent" };
    if (script.kind === "reply") future.resolve(script.bytes);
    if (script.kind === "fail") future.fail(script.error);
    return future;
  }
}

/** `CLIENT_BLOCK_GET_REQUEST` → `ClientBlockGetRequest` */
export function requestMessageName(messageType: MessageTypeName): string {
  return messageType
    .toLowerCase()
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

/** Base64 of an encoded header message, as the validator sends it inside a record. */
export function encodeHeader(
  schema: ProtocolSchema,
  headerType: "BlockHeader" | "BatchHeader" | "TransactionHeader",
  value: Record<string, unknown>,
): string {
  return Buffer.from(schema.encode(headerType, value)).toString("base64");
}

/** Route handler context wired to a fake validator. */
export function fakeRouteContext(
  fake: FakeValidator,
  options: { timeoutMs?: number; waitTimeoutFraction?: number } = {},
): RouteContext {
  return {
    backend: new BackendClient({
      sender: fake,
      schema: fake.schema,
      logger: createLogger("test", { level: "fatal" }),
      timeoutMs: options.timeoutMs ?? 300_000,
    }),
    expander: new HeaderExpander(fake.schema),
    waitTimeoutFraction: options.waitTimeoutFraction ?? 0.95,
  };
}
