import { describe, expect, it } from "vitest";
import { loadProtocolSchema } from "../backend/schema.js";
import { encodeHeader } from "../testing/fake-validator.js";
import { HeaderExpander, MalformedHeaderError } from "./headers.js";

const schema = loadProtocolSchema();
const expander = new HeaderExpander(schema);

const txnHeader = encodeHeader(schema, "TransactionHeader", {
  family_name: "intkey",
  family_version: "1.0",
  nonce: "n-1",
});
const batchHeader = encodeHeader(schema, "BatchHeader", {
  signer_pubkey: "02aa",
  transaction_ids: ["t1"],
});
const blockHeader = encodeHeader(schema, "BlockHeader", {
  block_num: 3,
  previous_block_id: "b2",
  batch_ids: ["c1"],
});

const expandedTxnHeader = {
  batcher_pubkey: "",
  dependencies: [],
  family_name: "intkey",
  family_version: "1.0",
  inputs: [],
  nonce: "n-1",
  outputs: [],
  payload_encoding: "",
  payload_sha512: "",
  signer_pubkey: "",
};

describe("HeaderExpander", () => {
  it("expands a transaction header and keeps the other fields", () => {
    const txn = { header: txnHeader, header_signature: "t1", payload: "AQI=" };
    expect(expander.expandTransaction(txn)).toEqual({
      header: expandedTxnHeader,
      header_signature: "t1",
      payload: "AQI=",
    });
  });

  it("expands a block and every nested batch and transaction", () => {
    const block = {
      header: blockHeader,
      header_signature: "b3",
      batches: [
        {
          header: batchHeader,
          header_signature: "c1",
          transactions: [{ header: txnHeader, header_signature: "t1", payload: "" }],
        },
      ],
    };

    expect(expander.expandBlock(block)).toEqual({
      header: {
        block_num: "3",
        previous_block_id: "b2",
        signer_pubkey: "",
        batch_ids: ["c1"],
        consensus: "",
        state_root_hash: "",
      },
      header_signature: "b3",
      batches: [
        {
          header: { signer_pubkey: "02aa", transaction_ids: ["t1"] },
          header_signature: "c1",
          transactions: [{ header: expandedTxnHeader, header_signature: "t1", payload: "" }],
        },
      ],
    });
  });

  it("leaves its input untouched", () => {
    const batch = { header: batchHeader, header_signature: "c1", transactions: [] };
    const expanded = expander.expandBatch(batch);
    expect(batch.header).toBe(batchHeader);
    expect(expanded).not.toBe(batch);
    expect(expanded.transactions).toEqual([]);
  });

  it("decodes an empty header to all defaults", () => {
    expect(expander.expandBatch({ header: "", transactions: [] }).header).toEqual({
      signer_pubkey: "",
      transaction_ids: [],
    });
  });

  it("rejects a header that is not base64", () => {
    expect(() => expander.expandTransaction({ header: "not base64!" })).toThrow(
      "Malformed transaction record: header is not valid base64",
    );
  });

  it("rejects a header that does not decode", () => {
    // 0x0a 0xff: a length-delimited field whose length runs past the end
    expect(() => expander.expandBatch({ header: "Cv8=", transactions: [] })).toThrow(
      MalformedHeaderError,
    );
  });

  it("rejects a record without a string header", () => {
    expect(() => expander.expandBlock({ header: 7 })).toThrow(
      "Malformed block record: header is not a base64 string",
    );
  });

  it("rejects children that are not a list", () => {
    expect(() => expander.expandBlock({ header: blockHeader, batches: "none" })).toThrow(
      "Malformed block record: batches is not a list",
    );
  });
});
