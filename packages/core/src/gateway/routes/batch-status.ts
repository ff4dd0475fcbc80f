import * as traps from "../../backend/traps.js";
import { BadStatusBody, MissingStatusId } from "../api-errors.js";
import { computeMetadata, wrapResponse } from "../envelope.js";
import type { ApiRequest } from "../request.js";
import type { RouteHandler } from "../router.js";
import { replyStatuses, resolveWait, type RouteContext } from "./context.js";

/**
 * GET|POST /batch_status: commit status of batches, keyed by id.
 * Ids come from a JSON array body (POST) or the comma separated `id`
 * query parameter (GET). Only GET responses carry a link.
 */
export function createListStatusesHandler(context: RouteContext): RouteHandler {
  return async (request) => {
    const isPost = request.method === "POST";
    const ids = isPost ? await readBodyIds(request) : readQueryIds(request);

    const reply = await context.backend.query({
      requestType: "CLIENT_BATCH_STATUS_REQUEST",
      requestMessage: "ClientBatchStatusRequest",
      replyType: "ClientBatchStatusResponse",
      content: { batch_ids: ids, ...resolveWait(request, context) },
      traps: [traps.StatusesNotReturned],
    });

    return wrapResponse({
      data: replyStatuses(reply),
      metadata: isPost ? undefined : computeMetadata(request, reply),
    });
  };
}

async function readBodyIds(request: ApiRequest): Promise<string[]> {
  if (request.contentType !== "application/json") {
    throw new BadStatusBody();
  }

  const raw = (await request.body()).toString("utf-8");
  let ids: unknown;
  try {
    ids = JSON.parse(raw);
  } catch (err) {
    throw new BadStatusBody(err);
  }

  if (!Array.isArray(ids)) throw new BadStatusBody();
  if (ids.length === 0) throw new MissingStatusId();
  if (!ids.every((id): id is string => typeof id === "string")) {
    throw new BadStatusBody();
  }
  return ids;
}

function readQueryIds(request: ApiRequest): string[] {
  const ids = request.url.searchParams.get("id");
  if (ids === null) throw new MissingStatusId();
  return ids.split(",");
}
