/**
 * Online API Transport
 *
 * Performs ApiRequests against the online metadata service over HTTP and
 * publishes the connectivity state metadata sources gate on. The state is
 * owned by whoever manages the session (login, network monitoring); the
 * transport only stores and broadcasts it.
 *
 * Outcome mapping for perform():
 * - 2xx → request completed with the parsed body
 * - 4xx other than 429 → request failed (the server rejected it), no throw
 * - 429 or 5xx → throws TransportError (the server could not answer)
 * - no response (network error, timeout) → throws TransportError
 * - malformed body → throws ResponseFormatError
 */

import axios from 'axios';
import type { ApiRequest } from './apiRequests';
import { TransportError, errorMessage } from './errors';
import { DEFAULT_SETTINGS } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Connectivity of the online service session */
export type ConnectivityState = 'offline' | 'connecting' | 'online' | 'failing';

/**
 * What metadata sources need from a transport.
 */
export interface ApiTransport {
  /** Current connectivity, read live */
  readonly state: ConnectivityState;
  /**
   * Performs a request and records its outcome on the request object.
   * Resolves once the request has completed or failed.
   *
   * @throws TransportError when the service could not be reached
   */
  perform<T>(request: ApiRequest<T>): Promise<void>;
}

/** Listener callback type for connectivity changes */
export type ConnectivityListener = (state: ConnectivityState, previous: ConnectivityState) => void;

/** Options for the HTTP transport */
export interface HttpApiTransportOptions {
  /** API base URL, without trailing slash */
  apiBaseUrl?: string;
  /** HTTP timeout per request in milliseconds */
  timeoutMs?: number;
  userAgent?: string;
  /** Bearer token ('' or undefined = anonymous) */
  accessToken?: string;
  /** Connectivity at construction time. Defaults to 'offline' */
  initialState?: ConnectivityState;
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

/** Statuses that say nothing about the item: rate limiting and server faults */
function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

// ─── HTTP Transport ──────────────────────────────────────────────────────────

/**
 * axios-backed ApiTransport.
 *
 * Usage:
 * ```typescript
 * const transport = new HttpApiTransport({ apiBaseUrl: 'https://metadata.example.org/api/v2' });
 * transport.setState('online');
 * const request = new GetItemRequest(checksum, 'track.flac');
 * await transport.perform(request);
 * ```
 */
export class HttpApiTransport implements ApiTransport {
  private currentState: ConnectivityState;
  private readonly listeners: ConnectivityListener[] = [];
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly accessToken: string;

  constructor(options: HttpApiTransportOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_SETTINGS.apiBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs;
    this.userAgent = options.userAgent || DEFAULT_SETTINGS.userAgent;
    this.accessToken = options.accessToken ?? '';
    this.currentState = options.initialState ?? 'offline';
  }

  get state(): ConnectivityState {
    return this.currentState;
  }

  /**
   * Updates the connectivity state and notifies listeners if it changed.
   */
  setState(state: ConnectivityState): void {
    const previous = this.currentState;
    if (previous === state) return;

    this.currentState = state;
    for (const listener of [...this.listeners]) {
      listener(state, previous);
    }
  }

  /**
   * Registers a listener for connectivity changes.
   * Returns an unsubscribe function.
   */
  onStateChange(listener: ConnectivityListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Builds the absolute URL for an endpoint path.
   */
  urlFor(endpoint: string): string {
    return `${this.apiBaseUrl}/${endpoint.replace(/^\/+/, '')}`;
  }

  async perform<T>(request: ApiRequest<T>): Promise<void> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    if (this.accessToken) {
      headers.Authorization = `Bearer ${this.accessToken}`;
    }

    let body: unknown;
    try {
      const response = await axios.get<unknown>(this.urlFor(request.endpoint), {
        params: request.params,
        headers,
        timeout: this.timeoutMs,
      });
      body = response.data;
    } catch (error: unknown) {
      if (isAxiosLikeError(error) && error.response) {
        const status = error.response.status;
        if (isRetryableStatus(status)) {
          throw new TransportError(`${request.endpoint} is unavailable (${status})`, {
            statusCode: status,
            endpoint: request.endpoint,
            cause: error,
          });
        }
        request.fail(
          new TransportError(`${request.endpoint} rejected the request (${status})`, {
            statusCode: status,
            endpoint: request.endpoint,
            cause: error,
          }),
        );
        return;
      }

      throw new TransportError(`Request to ${request.endpoint} failed: ${errorMessage(error)}`, {
        endpoint: request.endpoint,
        cause: error instanceof Error ? error : undefined,
      });
    }

    request.complete(body);
  }
}
