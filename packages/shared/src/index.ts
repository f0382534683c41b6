export { extractBearerToken, signServiceJwt, verifyServiceJwt } from "./serviceAuth.js";
export { makeErrorResponse } from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
