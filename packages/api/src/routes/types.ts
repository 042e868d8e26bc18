import type { AppContext } from "../lib/context.js";

export type RouteOptions = {
  ctx: AppContext;
};
