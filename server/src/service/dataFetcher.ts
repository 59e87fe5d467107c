import { FetchError as HttpClientError, type Response } from 'node-fetch';
import type {
  CategoryRecord,
  FetchRequestData,
  RequestData,
} from '../model/personalIndex';
import {
  createCollaboratorRequester,
  readResponseText,
  type CollaboratorHttpOptions,
} from './collaboratorHttp';
import { describeError, FetchError } from './errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// The collaborator may serialize decimals as strings ("150.00").
const toAmount = (value: unknown): number => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
};

const toCategoryId = (value: unknown): CategoryRecord['id'] =>
  typeof value === 'string' || typeof value === 'number' ? value : null;

const toCategory = (raw: unknown): CategoryRecord => {
  if (!isRecord(raw)) {
    return { id: null, userSpent: 0, basePrice: 0 };
  }
  return {
    id: toCategoryId(raw.id),
    userSpent: toAmount(raw.userSpent),
    basePrice: toAmount(raw.basePrice),
  };
};

export const decodeRequestData = (body: unknown): RequestData => {
  if (!isRecord(body)) {
    return { categories: [], comparisonDate: null };
  }
  const categories = Array.isArray(body.categories)
    ? body.categories.map(toCategory)
    : [];
  const comparisonDate =
    body.comparisonDate == null ? null : String(body.comparisonDate);
  return { categories, comparisonDate };
};

export const createDataFetcher = (
  options: CollaboratorHttpOptions
): FetchRequestData => {
  const request = createCollaboratorRequester(options);

  return async (requestId) => {
    let response: Response;
    try {
      response = await request(requestId, 'async-data', { method: 'GET' });
    } catch (error) {
      throw new FetchError(
        `Failed to fetch data for request ${requestId}: ${describeError(error)}`,
        { requestId, kind: 'TRANSPORT', cause: error }
      );
    }

    if (!response.ok) {
      const responseText = await readResponseText(response);
      throw new FetchError(
        `Failed to fetch data for request ${requestId}: HTTP ${response.status}`,
        {
          requestId,
          kind: 'BAD_STATUS',
          status: response.status,
          responseText,
        }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      // body timeouts and dropped connections surface here too
      if (error instanceof HttpClientError && error.type !== 'invalid-json') {
        throw new FetchError(
          `Failed to fetch data for request ${requestId}: ${error.message}`,
          { requestId, kind: 'TRANSPORT', status: response.status, cause: error }
        );
      }
      throw new FetchError(
        `Collaborator returned a non-JSON body for request ${requestId}`,
        { requestId, kind: 'INVALID_BODY', status: response.status, cause: error }
      );
    }

    return decodeRequestData(body);
  };
};
