import { join } from "node:path";
import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";

/**
 * Runtime view of the validator wire schema. The `.proto` files are the
 * external contract; nothing here is generated from them.
 */

const PROTO_DIR = fileURLToPath(new URL("../../proto/", import.meta.url));

export const PROTO_FILES = [
  "validator.proto",
  "transaction.proto",
  "batch.proto",
  "block.proto",
  "client.proto",
] as const;

export const REPLY_TYPES = [
  "ClientBatchSubmitResponse",
  "ClientBatchStatusResponse",
  "ClientStateListResponse",
  "ClientStateGetResponse",
  "ClientBlockListResponse",
  "ClientBlockGetResponse",
  "ClientBatchListResponse",
  "ClientBatchGetResponse",
] as const;

export type ReplyTypeName = (typeof REPLY_TYPES)[number];

export type MessageTypeName =
  | "CLIENT_BATCH_SUBMIT_REQUEST"
  | "CLIENT_BATCH_STATUS_REQUEST"
  | "CLIENT_STATE_LIST_REQUEST"
  | "CLIENT_STATE_GET_REQUEST"
  | "CLIENT_BLOCK_LIST_REQUEST"
  | "CLIENT_BLOCK_GET_REQUEST"
  | "CLIENT_BATCH_LIST_REQUEST"
  | "CLIENT_BATCH_GET_REQUEST";

/** Status name → status code for one reply type. */
export type StatusTable = ReadonlyMap<string, number>;

/**
 * Proto field names preserved, defaults filled in, enums as names,
 * 64-bit integers as strings and bytes as base64 text.
 */
export const JSON_CONVERSION: protobuf.IConversionOptions = {
  enums: String,
  longs: String,
  bytes: String,
  defaults: true,
  arrays: true,
  objects: true,
};

export class ProtocolSchema {
  private readonly messageTypes: ReadonlyMap<string, number>;
  private readonly statusTables: ReadonlyMap<ReplyTypeName, StatusTable>;

  constructor(private readonly root: protobuf.Root) {
    this.messageTypes = new Map(
      Object.entries(root.lookupEnum("Message.MessageType").values),
    );

    const tables = new Map<ReplyTypeName, StatusTable>();
    for (const replyType of REPLY_TYPES) {
      const statusEnum = root.lookupType(replyType).lookupEnum("Status");
      tables.set(replyType, new Map(Object.entries(statusEnum.values)));
    }
    this.statusTables = tables;
  }

  type(name: string): protobuf.Type {
    return this.root.lookupType(name);
  }

  messageType(name: MessageTypeName): number {
    const tag = this.messageTypes.get(name);
    if (tag === undefined) {
      throw new Error(`Unknown message type: ${name}`);
    }
    return tag;
  }

  statuses(replyType: ReplyTypeName): StatusTable {
    const table = this.statusTables.get(replyType);
    if (!table) {
      throw new Error(`No status table for reply type: ${replyType}`);
    }
    return table;
  }

  encode(typeName: string, value: Record<string, unknown>): Uint8Array {
    const type = this.type(typeName);
    return type.encode(type.fromObject(value)).finish();
  }

  /** Throws when the bytes are not a valid encoding of `typeName`. */
  decode(typeName: string, bytes: Uint8Array): protobuf.Message {
    return this.type(typeName).decode(bytes);
  }

  toObject(
    typeName: string,
    message: protobuf.Message,
    options: protobuf.IConversionOptions = JSON_CONVERSION,
  ): Record<string, unknown> {
    return this.type(typeName).toObject(message, options);
  }

  /** Numeric value of a decoded reply's `status` field. */
  statusOf(typeName: string, message: protobuf.Message): number {
    const { status } = this.toObject(typeName, message, { defaults: true });
    return typeof status === "number" ? status : 0;
  }
}

let cached: ProtocolSchema | undefined;

/**
 * Load the wire schema from `proto/`. The result is cached for the
 * lifetime of the process.
 */
export function loadProtocolSchema(): ProtocolSchema {
  if (!cached) {
    const root = new protobuf.Root().loadSync(
      PROTO_FILES.map((file) => join(PROTO_DIR, file)),
      { keepCase: true },
    );
    root.resolveAll();
    cached = new ProtocolSchema(root);
  }
  return cached;
}
