import type { Route } from "../router.js";
import { createListStatusesHandler } from "./batch-status.js";
import {
  createFetchBatchHandler,
  createListBatchesHandler,
  createSubmitBatchesHandler,
} from "./batches.js";
import { createFetchBlockHandler, createListBlocksHandler } from "./blocks.js";
import type { RouteContext } from "./context.js";
import { createFetchStateHandler, createListStateHandler } from "./state.js";

export type { RouteContext } from "./context.js";

export function createRoutes(context: RouteContext): Route[] {
  const listStatuses = createListStatusesHandler(context);

  return [
    { method: "POST", path: "/batches", handler: createSubmitBatchesHandler(context) },
    { method: "GET", path: "/batch_status", handler: listStatuses },
    { method: "POST", path: "/batch_status", handler: listStatuses },
    { method: "GET", path: "/state", handler: createListStateHandler(context) },
    { method: "GET", path: "/state/{address}", handler: createFetchStateHandler(context) },
    { method: "GET", path: "/blocks", handler: createListBlocksHandler(context) },
    { method: "GET", path: "/blocks/{block_id}", handler: createFetchBlockHandler(context) },
    { method: "GET", path: "/batches", handler: createListBatchesHandler(context) },
    { method: "GET", path: "/batches/{batch_id}", handler: createFetchBatchHandler(context) },
  ];
}
