import { z } from "zod";
import * as traps from "../../backend/traps.js";
import { BadProtobuf, EmptyProtobuf, WrongBodyType } from "../api-errors.js";
import { computeMetadata, wrapResponse } from "../envelope.js";
import type { RouteHandler } from "../router.js";
import {
  filterIds,
  queryValue,
  replyList,
  replyStatuses,
  resolveWait,
  type RouteContext,
} from "./context.js";

const SubmittedBatchListSchema = z.object({
  batches: z.array(z.object({ header_signature: z.string() }).passthrough()),
});

/**
 * POST /batches: submit a binary BatchList.
 *
 * 202 when the validator returned no statuses (not waiting), 200 with
 * the statuses when some batch is not yet committed, 201 with no data
 * once every batch has committed.
 */
export function createSubmitBatchesHandler(context: RouteContext): RouteHandler {
  const { schema } = context.backend;

  return async (request) => {
    if (request.contentType !== "application/octet-stream") {
      throw new WrongBodyType();
    }

    const payload = await request.body();
    if (payload.length === 0) {
      throw new EmptyProtobuf();
    }

    let batches: z.infer<typeof SubmittedBatchListSchema>["batches"];
    try {
      const decoded = schema.decode("BatchList", payload);
      batches = SubmittedBatchListSchema.parse(
        schema.toObject("BatchList", decoded, { defaults: true, arrays: true }),
      ).batches;
    } catch (err) {
      throw new BadProtobuf(err);
    }

    const reply = await context.backend.query({
      requestType: "CLIENT_BATCH_SUBMIT_REQUEST",
      requestMessage: "ClientBatchSubmitRequest",
      replyType: "ClientBatchSubmitResponse",
      content: { batches, ...resolveWait(request, context) },
      traps: [traps.InvalidBatch],
    });

    const { protocol, host } = request.url;
    const ids = batches.map((batch) => batch.header_signature).join(",");
    const link = `${protocol}//${host}/batch_status?id=${ids}`;
    const statuses = replyStatuses(reply);

    if (Object.keys(statuses).length === 0) {
      return wrapResponse({ metadata: { link }, status: 202 });
    }
    if (Object.values(statuses).some((status) => status !== "COMMITTED")) {
      return wrapResponse({ data: statuses, metadata: { link }, status: 200 });
    }
    return wrapResponse({
      metadata: { link: link.replace("batch_status", "batches") },
      status: 201,
    });
  };
}

/** GET /batches: fully expanded batches, optionally filtered by `id`. */
export function createListBatchesHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_BATCH_LIST_REQUEST",
      requestMessage: "ClientBatchListRequest",
      replyType: "ClientBatchListResponse",
      content: {
        head_id: queryValue(request, "head"),
        batch_ids: filterIds(request),
      },
    });

    const batches = replyList(reply, "batches").map((batch) =>
      context.expander.expandBatch(batch),
    );
    return wrapResponse({ data: batches, metadata: computeMetadata(request, reply) });
  };
}

/** GET /batches/{batch_id} */
export function createFetchBatchHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_BATCH_GET_REQUEST",
      requestMessage: "ClientBatchGetRequest",
      replyType: "ClientBatchGetResponse",
      content: { batch_id: request.params.batch_id ?? "" },
      traps: [traps.MissingBatch, traps.InvalidBatchId],
    });

    return wrapResponse({
      data: context.expander.expandBatch(reply.batch),
      metadata: computeMetadata(request, reply),
    });
  };
}
