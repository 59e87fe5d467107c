import fetch, { type RequestInit, type Response } from 'node-fetch';
import type { RequestIdentifier } from '../model/personalIndex';

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface CollaboratorHttpOptions {
  baseUrl: string;
  authToken: string;
  timeoutMs: number;
  fetchImpl?: HttpFetch;
}

export type CollaboratorEndpoint = 'async-data' | 'async-result';

export const AUTH_HEADER = 'X-Auth-Token';

export const buildCollaboratorUrl = (
  baseUrl: string,
  requestId: RequestIdentifier,
  endpoint: CollaboratorEndpoint
): string =>
  `${baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(requestId)}/${endpoint}`;

/**
 * Sends one request to the collaborator service. Resolves with the response
 * whatever its status; rejects only on transport failure or timeout.
 */
export const createCollaboratorRequester = ({
  baseUrl,
  authToken,
  timeoutMs,
  fetchImpl = fetch,
}: CollaboratorHttpOptions) => {
  return (
    requestId: RequestIdentifier,
    endpoint: CollaboratorEndpoint,
    init: { method: 'GET' | 'PUT'; body?: unknown }
  ): Promise<Response> => {
    const url = buildCollaboratorUrl(baseUrl, requestId, endpoint);
    return fetchImpl(url, {
      method: init.method,
      headers: {
        'Content-Type': 'application/json',
        [AUTH_HEADER]: authToken,
      },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      timeout: timeoutMs,
    });
  };
};

export const readResponseText = async (response: Response): Promise<string> => {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
};
