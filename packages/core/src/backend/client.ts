import type { Logger } from "tslog";
import { ValidatorUnavailable } from "../gateway/api-errors.js";
import type { BackendSender } from "./connection.js";
import { BackendDisconnectedError, ReplyTimeoutError } from "./errors.js";
import type { MessageTypeName, ProtocolSchema, ReplyTypeName } from "./schema.js";
import { buildTrapChain, checkStatus, type TrapSpec } from "./traps.js";

export interface BackendQuery {
  requestType: MessageTypeName;
  /** Schema name of the request message, e.g. "ClientBlockGetRequest". */
  requestMessage: string;
  replyType: ReplyTypeName;
  content: Record<string, unknown>;
  /** Endpoint traps, checked in order before the baseline traps. */
  traps?: readonly TrapSpec[];
}

export interface BackendClientOptions {
  sender: BackendSender;
  schema: ProtocolSchema;
  logger: Logger<unknown>;
  /** How long each request may wait for its reply, in milliseconds. */
  timeoutMs: number;
}

/**
 * Sends one typed request to the validator and returns its reply as a
 * plain object, once the reply's status has passed the trap chain.
 */
export class BackendClient {
  readonly schema: ProtocolSchema;
  readonly timeoutMs: number;
  private readonly sender: BackendSender;
  private readonly logger: Logger<unknown>;

  constructor(options: BackendClientOptions) {
    this.sender = options.sender;
    this.schema = options.schema;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
  }

  async query(query: BackendQuery): Promise<Record<string, unknown>> {
    const content = this.schema.encode(query.requestMessage, query.content);
    const future = this.sender.send(query.requestType, content);
    this.logger.debug(`${query.requestType} sent as ${future.correlationId}`);

    let replyBytes: Uint8Array;
    try {
      replyBytes = await future.result(this.timeoutMs);
    } catch (err) {
      if (err instanceof ReplyTimeoutError || err instanceof BackendDisconnectedError) {
        this.logger.warn(`${query.requestType} failed: ${err.message}`);
        throw new ValidatorUnavailable(err);
      }
      throw err;
    }

    const reply = this.schema.decode(query.replyType, replyBytes);
    const chain = buildTrapChain(this.schema.statuses(query.replyType), query.traps);
    checkStatus(chain, this.schema.statusOf(query.replyType, reply));

    return this.schema.toObject(query.replyType, reply);
  }
}
