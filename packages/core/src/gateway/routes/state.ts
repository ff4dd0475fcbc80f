import * as traps from "../../backend/traps.js";
import { computeMetadata, wrapResponse } from "../envelope.js";
import type { RouteHandler } from "../router.js";
import { queryValue, replyList, type RouteContext } from "./context.js";

/**
 * GET /state: leaves of the state tree, optionally under an address
 * prefix, as of `head` (or the current chain head).
 */
export function createListStateHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_STATE_LIST_REQUEST",
      requestMessage: "ClientStateListRequest",
      replyType: "ClientStateListResponse",
      content: {
        head_id: queryValue(request, "head"),
        address: queryValue(request, "address"),
      },
    });

    return wrapResponse({
      data: replyList(reply, "leaves"),
      metadata: computeMetadata(request, reply),
    });
  };
}

/**
 * GET /state/{address}: the base64 data stored at one address.
 */
export function createFetchStateHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const reply = await context.backend.query({
      requestType: "CLIENT_STATE_GET_REQUEST",
      requestMessage: "ClientStateGetRequest",
      replyType: "ClientStateGetResponse",
      content: {
        head_id: queryValue(request, "head"),
        address: request.params.address ?? "",
      },
      traps: [traps.MissingLeaf, traps.BadAddress],
    });

    return wrapResponse({
      data: reply.value,
      metadata: computeMetadata(request, reply),
    });
  };
}
