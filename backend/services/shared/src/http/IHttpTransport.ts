// backend/services/shared/src/http/IHttpTransport.ts
/**
 * Outbound "send request, receive status + body" contract.
 *
 * Implementations:
 * - resolve for every HTTP status (status checks belong to the caller),
 * - reject with TransportError only when no response was received.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
};

export type HttpResponse = {
  status: number;
  body: string;
};

export interface IHttpTransport {
  send(req: HttpRequest): Promise<HttpResponse>;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
