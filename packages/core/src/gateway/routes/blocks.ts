import * as traps from "../../backend/traps.js";
import { computeMetadata, wrapResponse } from "../envelope.js";
import type { RouteHandler } from "../router.js";
import { filterIds, queryValue, replyList, type RouteContext } from "./context.js";

/** GET /blocks: fully expanded blocks, optionally filtered by `id`. */
export function createListBlocksHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_BLOCK_LIST_REQUEST",
      requestMessage: "ClientBlockListRequest",
      replyType: "ClientBlockListResponse",
      content: {
        head_id: queryValue(request, "head"),
        block_ids: filterIds(request),
      },
    });

    const blocks = replyList(reply, "blocks").map((block) =>
      context.expander.expandBlock(block),
    );
    return wrapResponse({ data: blocks, metadata: computeMetadata(request, reply) });
  };
}

/** GET /blocks/{block_id} */
export function createFetchBlockHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_BLOCK_GET_REQUEST",
      requestMessage: "ClientBlockGetRequest",
      replyType: "ClientBlockGetResponse",
      content: { block_id: request.params.block_id ?? "" },
      traps: [traps.MissingBlock, traps.InvalidBlockId],
    });

    return wrapResponse({
      data: context.expander.expandBlock(reply.block),
      metadata: computeMetadata(request, reply),
    });
  };
}
