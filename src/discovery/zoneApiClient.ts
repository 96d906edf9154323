import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import { TransportError } from '../core/errors.js';
import { createHttpClient, isSuccessStatus, postJson, DEFAULT_TIMEOUT_MS } from '../core/http.js';
import type { Logger } from '../core/logger.js';
import { graphqlEnvelopeSchema, type GraphQLErrorEntry } from './schemas.js';

export interface GraphQLResult<T> {
  /** Null when the server returned errors only. */
  data: T | null;
  errors: GraphQLErrorEntry[];
}

export interface GraphQLQueryClient {
  query<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<GraphQLResult<T>>;
}

export interface ZoneApiClientOptions {
  url: string;
  /** Base64 service-account credentials, sent as HTTP Basic auth. */
  token: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export const describeErrors = (errors: GraphQLErrorEntry[]): string => errors.map((e) => e.message).join('; ');

/** Data is required; errors beside data are only logged. */
export const requireData = <T>(result: GraphQLResult<T>, what: string): T => {
  if (result.data === null) {
    const reason = result.errors.length > 0 ? describeErrors(result.errors) : 'empty response';
    throw new TransportError(`${what}: ${reason}`);
  }
  return result.data;
};

/**
 * GraphQL client for the zone provider. HTTP and shape problems throw;
 * GraphQL-level errors come back beside whatever data the server returned.
 */
export class ZoneApiClient implements GraphQLQueryClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly opts: ZoneApiClientOptions,
    private readonly logger: Logger
  ) {
    this.http = opts.http ?? createHttpClient(opts.url, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  async query<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<GraphQLResult<T>> {
    const res = await postJson<{ query: string; variables: Record<string, unknown> }, unknown>(
      this.http,
      '',
      { query, variables },
      { Authorization: `Basic ${this.opts.token}` }
    );

    if (!isSuccessStatus(res.status)) {
      throw new TransportError(`GraphQL HTTP ${res.status}`, res.status, res.data);
    }

    const envelope = graphqlEnvelopeSchema.safeParse(res.data);
    if (!envelope.success) {
      throw new TransportError('Malformed GraphQL response', res.status);
    }
    const errors = envelope.data.errors ?? [];

    if (envelope.data.data === undefined || envelope.data.data === null) {
      return { data: null, errors };
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new TransportError(`Unexpected GraphQL response shape: ${details}`, res.status);
    }

    if (errors.length > 0) {
      this.logger.warn('graphql returned partial data', { errors: describeErrors(errors) });
    }
    return { data: parsed.data, errors };
  }
}
