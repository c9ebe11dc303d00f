export const PACKAGE_NAME = "@faultmap/core" as const;

export { executeChain } from "./chain.js";
export { type Clock, defaultClock } from "./clock-types.js";
export type { HttpRequest, HttpResponse, RequestHandler } from "./http-types.js";
export {
  type Interceptor,
  type InterceptorContext,
  type InterceptorStage,
  withError,
  withResponse,
} from "./interceptor-types.js";
