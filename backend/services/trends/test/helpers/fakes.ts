// backend/services/trends/test/helpers/fakes.ts
import { generateKeyPairSync } from "node:crypto";
import type { IKvStore } from "@rt/shared/cache/IKvStore";
import type {
  HttpRequest,
  HttpResponse,
  IHttpTransport,
} from "@rt/shared/http/IHttpTransport";
import type { TrendsEnvShape } from "../../src/env/TrendsEnv";

/** Records every request; answers from a queue (or a responder fn). */
export class FakeTransport implements IHttpTransport {
  public readonly requests: HttpRequest[] = [];
  private readonly queue: Array<HttpResponse | Error> = [];

  constructor(private readonly responder?: (req: HttpRequest) => HttpResponse) {}

  reply(status: number, body: string | object): this {
    this.queue.push({
      status,
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
    return this;
  }

  fail(err: Error): this {
    this.queue.push(err);
    return this;
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    const next = this.queue.shift();
    if (next instanceof Error) throw next;
    if (next) return next;
    if (this.responder) return this.responder(req);
    throw new Error(`FakeTransport: no response queued for ${req.method} ${req.url}`);
  }
}

export class FailingKvStore implements IKvStore {
  public readonly kind = "failing";
  public getCalls = 0;
  public setCalls = 0;

  async get(_key: string): Promise<string | null> {
    this.getCalls++;
    throw new Error("kv down");
  }

  async set(_key: string, _value: string, _ttlSec: number): Promise<void> {
    this.setCalls++;
    throw new Error("kv down");
  }
}

export type TestKeyPair = { privateKey: string; publicKey: string };

let cachedPair: TestKeyPair | undefined;

/** 2048-bit RSA pair, generated once per test file. */
export function rsaKeyPair(): TestKeyPair {
  if (!cachedPair) {
    cachedPair = generateKeyPairSync("rsa", {
      modulusLength: 2048,
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
      publicKeyEncoding: { type: "spki", format: "pem" },
    });
  }
  return cachedPair;
}

export const TOKEN_URL = "https://idp.test/token";
export const BQ_BASE = "https://warehouse.test/bigquery/v2";
export const QUERY_URL = `${BQ_BASE}/projects/test-project/queries`;

export function testEnv(over: Partial<TrendsEnvShape> = {}): TrendsEnvShape {
  return {
    SA_EMAIL: "writer@test-project.iam.example.com",
    SA_PRIVATE_KEY: rsaKeyPair().privateKey,
    TOKEN_AUDIENCE: TOKEN_URL,
    TOKEN_GRANT_TYPE: "urn:ietf:params:oauth:grant-type:jwt-bearer",
    TOKEN_CACHE: "memory",
    REDIS_URL: undefined,
    TOKEN_SINGLE_FLIGHT: true,
    BQ_SCOPE: "https://scopes.test/bigquery",
    BQ_PROJECT_ID: "test-project",
    BQ_DATASET_TABLE_ID: "trends.rising",
    BQ_API_BASE_URL: BQ_BASE,
    OUTBOUND_TIMEOUT_MS: 1000,
    TRENDS_PORT: 0,
    LOG_LEVEL: "silent",
    ...over,
  };
}

/** Minimal warehouse response with the rising-terms schema. */
export function queryResponse(rows?: Array<Array<string | null>>): object {
  const fields = [
    { name: "term", type: "STRING" },
    { name: "rank", type: "INTEGER" },
    { name: "week", type: "DATE" },
  ];
  const schema = { fields };
  if (!rows) return { kind: "bigquery#queryResponse", schema, jobComplete: true };
  return {
    kind: "bigquery#queryResponse",
    schema,
    jobComplete: true,
    rows: rows.map((cells) => ({ f: cells.map((v) => ({ v })) })),
  };
}
