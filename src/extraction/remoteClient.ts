import { z } from 'zod';
import { bearerHeaders, HttpRequestError, requestJson } from '../utils/http';
import { createLogger } from '../utils/logger';
import { RemoteServiceError } from './errors';
import {
  ExtractTriplesResponseSchema,
  HealthResponseSchema,
  ModelProfileSummarySchema,
  StatusMessageSchema,
  TrainModelResponseSchema,
  type ExtractTriplesRequest,
  type ExtractTriplesResponse,
  type TrainModelRequest,
  type TrainModelResponse,
} from './schemas';
import type { ModelProfileSummary } from './types';

const logger = createLogger('extraction/remoteClient');

export interface RemoteClientOptions {
  baseUrl: string;
  apiKey?: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

/**
 * Client for a peer extraction server. Every failure, whether network,
 * timeout, HTTP status or malformed payload, surfaces as `RemoteServiceError`.
 */
export class RemoteExtractionClient {
  constructor(private readonly options: RemoteClientOptions) {}

  async health(): Promise<z.infer<typeof HealthResponseSchema>> {
    return this.call('/health', HealthResponseSchema, { timeoutMs: this.options.connectTimeoutMs });
  }

  async listModels(): Promise<ModelProfileSummary[]> {
    return this.call('/models', z.array(ModelProfileSummarySchema), {
      timeoutMs: this.options.connectTimeoutMs,
    });
  }

  /**
   * The health probe bounds connection setup by the connect timeout; the
   * extraction call itself gets the (longer) read timeout.
   */
  async extractTriples(request: ExtractTriplesRequest): Promise<ExtractTriplesResponse> {
    await this.health();
    logger.info(
      { url: this.options.baseUrl, documents: request.documents.length, profile: request.model_profile },
      'Sending extraction request to remote server'
    );
    return this.call('/extract_triples', ExtractTriplesResponseSchema, {
      method: 'POST',
      body: request,
      timeoutMs: this.options.readTimeoutMs,
    });
  }

  async trainModel(request: TrainModelRequest): Promise<TrainModelResponse> {
    await this.health();
    return this.call('/train_model', TrainModelResponseSchema, {
      method: 'POST',
      body: request,
      timeoutMs: this.options.readTimeoutMs,
    });
  }

  async unloadModel(profileName: string): Promise<void> {
    await this.call('/unload_model', StatusMessageSchema, {
      method: 'POST',
      body: { model_profile: profileName },
      timeoutMs: this.options.readTimeoutMs,
    });
  }

  async unloadAll(): Promise<void> {
    await this.call('/unload_all', StatusMessageSchema, {
      method: 'POST',
      body: {},
      timeoutMs: this.options.readTimeoutMs,
    });
  }

  private async call<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    opts: { method?: 'GET' | 'POST'; body?: unknown; timeoutMs: number }
  ): Promise<z.output<S>> {
    try {
      return await requestJson(`${this.options.baseUrl}${path}`, schema, {
        ...opts,
        headers: bearerHeaders(this.options.apiKey),
      });
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw new RemoteServiceError(error.message, error.status, { cause: error });
      }
      throw error;
    }
  }
}
