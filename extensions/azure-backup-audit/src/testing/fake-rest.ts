/**
 * In-process `RestGetter` for tests. Routes are keyed by exact target; an
 * unrouted target reads as `null`, the same as a terminal HTTP failure.
 */

import type { RestGetter, RestResponse } from "../http/types.js";

type Route = { kind: "body"; response: RestResponse } | { kind: "null" } | { kind: "throw"; error: unknown };

export class FakeRestGetter implements RestGetter {
  readonly calls: string[] = [];
  private readonly routes = new Map<string, Route>();

  on(target: string, body: unknown, headers: Record<string, string> = {}): this {
    this.routes.set(target, { kind: "body", response: { status: 200, body, headers } });
    return this;
  }

  fail(target: string): this {
    this.routes.set(target, { kind: "null" });
    return this;
  }

  throwOn(target: string, error: unknown): this {
    this.routes.set(target, { kind: "throw", error });
    return this;
  }

  async get(target: string): Promise<RestResponse | null> {
    this.calls.push(target);
    const route = this.routes.get(target);
    if (!route || route.kind === "null") return null;
    if (route.kind === "throw") throw route.error;
    return route.response;
  }
}
