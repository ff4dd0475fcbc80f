import { MethodNotAllowed, RouteNotFound } from "./api-errors.js";
import type { ApiRequest, ApiResponse } from "./request.js";

export type RouteHandler = (request: ApiRequest) => Promise<ApiResponse>;

export interface Route {
  method: "GET" | "POST";
  /** Literal segments and `{name}` captures, e.g. `/blocks/{block_id}`. */
  path: string;
  handler: RouteHandler;
}

export interface RouteMatch {
  handler: RouteHandler;
  params: Record<string, string>;
}

export interface Router {
  /** Throws RouteNotFound or MethodNotAllowed when nothing matches. */
  match(method: string, pathname: string): RouteMatch;
  routes(): readonly Route[];
}

interface CompiledRoute extends Route {
  segments: string[];
}

export function createRouter(routes: readonly Route[]): Router {
  const compiled: CompiledRoute[] = routes.map((route) => ({
    ...route,
    segments: splitPath(route.path),
  }));

  function match(method: string, pathname: string): RouteMatch {
    const segments = splitPath(pathname);
    let pathMatched = false;

    for (const route of compiled) {
      const params = matchSegments(route.segments, segments);
      if (!params) continue;
      pathMatched = true;
      if (route.method === method.toUpperCase()) {
        return { handler: route.handler, params };
      }
    }

    throw pathMatched ? new MethodNotAllowed() : new RouteNotFound();
  }

  return { match, routes: () => routes };
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment !== "");
}

function matchSegments(
  pattern: readonly string[],
  actual: readonly string[],
): Record<string, string> | undefined {
  if (pattern.length !== actual.length) return undefined;

  const params: Record<string, string> = {};
  for (const [i, expected] of pattern.entries()) {
    const segment = actual[i] ?? "";
    if (expected.startsWith("{") && expected.endsWith("}")) {
      params[expected.slice(1, -1)] = decodeSegment(segment);
    } else if (expected !== segment) {
      return undefined;
    }
  }
  return params;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
