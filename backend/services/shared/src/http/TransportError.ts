// backend/services/shared/src/http/TransportError.ts
import { ServiceError } from "../problem/ServiceError";

/** The outbound call could not be completed (DNS, connect, TLS, timeout). */
export class TransportError extends ServiceError {
  constructor(
    message: string,
    opts: { meta?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, {
      code: "TRANSPORT_FAILED",
      httpStatus: 502,
      title: "Bad Gateway",
      meta: opts.meta,
      cause: opts.cause,
    });
  }
}
