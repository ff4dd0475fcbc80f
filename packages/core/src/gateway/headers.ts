import { JSON_CONVERSION, type ProtocolSchema } from "../backend/schema.js";

/**
 * Blocks, batches and transactions arrive with their `header` still a
 * base64 string of an encoded header message. Expansion decodes every
 * header, children first, so no response carries an opaque header blob.
 */

export type RecordKind = "block" | "batch" | "transaction";

interface KindInfo {
  headerType: string;
  children?: { key: string; kind: RecordKind };
}

const KINDS: Record<RecordKind, KindInfo> = {
  block: { headerType: "BlockHeader", children: { key: "batches", kind: "batch" } },
  batch: { headerType: "BatchHeader", children: { key: "transactions", kind: "transaction" } },
  transaction: { headerType: "TransactionHeader" },
};

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type WireRecord = Record<string, unknown>;

/**
 * The validator sent a record whose header cannot be decoded. This is a
 * broken contract with the validator, not a client mistake.
 */
export class MalformedHeaderError extends Error {
  constructor(
    public readonly kind: RecordKind,
    reason: string,
    public readonly cause?: unknown,
  ) {
    super(`Malformed ${kind} record: ${reason}`);
    this.name = "MalformedHeaderError";
  }
}

export class HeaderExpander {
  constructor(private readonly schema: ProtocolSchema) {}

  expandBlock(block: unknown): WireRecord {
    return this.expand("block", block);
  }

  expandBatch(batch: unknown): WireRecord {
    return this.expand("batch", batch);
  }

  expandTransaction(transaction: unknown): WireRecord {
    return this.expand("transaction", transaction);
  }

  private expand(kind: RecordKind, value: unknown): WireRecord {
    if (!isRecord(value)) {
      throw new MalformedHeaderError(kind, "not an object");
    }

    const { headerType, children } = KINDS[kind];
    const expanded: WireRecord = { ...value, header: this.decodeHeader(kind, headerType, value.header) };

    if (children && children.key in value) {
      const list = value[children.key];
      if (!Array.isArray(list)) {
        throw new MalformedHeaderError(kind, `${children.key} is not a list`);
      }
      expanded[children.key] = list.map((child: unknown) => this.expand(children.kind, child));
    }

    return expanded;
  }

  private decodeHeader(kind: RecordKind, headerType: string, header: unknown): WireRecord {
    if (typeof header !== "string") {
      throw new MalformedHeaderError(kind, "header is not a base64 string");
    }
    if (!BASE64_RE.test(header)) {
      throw new MalformedHeaderError(kind, "header is not valid base64");
    }

    try {
      const message = this.schema.decode(headerType, Buffer.from(header, "base64"));
      return this.schema.toObject(headerType, message, JSON_CONVERSION);
    } catch (err) {
      throw new MalformedHeaderError(kind, `header is not a ${headerType}`, err);
    }
  }
}

function isRecord(value: unknown): value is WireRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
