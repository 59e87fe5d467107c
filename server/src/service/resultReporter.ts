import type { Response } from 'node-fetch';
import type { CalculationOutcome, ReportResult } from '../model/personalIndex';
import {
  createCollaboratorRequester,
  readResponseText,
  type CollaboratorHttpOptions,
} from './collaboratorHttp';
import { describeError, ReportError } from './errors';

export interface ResultPayload {
  personalCPI: number | null;
  success: boolean;
}

export const toResultPayload = (outcome: CalculationOutcome): ResultPayload => ({
  personalCPI: outcome.success ? outcome.personalIndex ?? null : null,
  success: outcome.success,
});

export const createResultReporter = (
  options: CollaboratorHttpOptions
): ReportResult => {
  const request = createCollaboratorRequester(options);

  return async (outcome) => {
    const requestId = outcome.id;
    let response: Response;
    try {
      response = await request(requestId, 'async-result', {
        method: 'PUT',
        body: toResultPayload(outcome),
      });
    } catch (error) {
      throw new ReportError(
        `Failed to send result for request ${requestId}: ${describeError(error)}`,
        { requestId, kind: 'TRANSPORT', cause: error }
      );
    }

    if (!response.ok) {
      const responseText = await readResponseText(response);
      throw new ReportError(
        `Failed to send result for request ${requestId}: HTTP ${response.status} - ${responseText}`,
        {
          requestId,
          kind: 'BAD_STATUS',
          status: response.status,
          responseText,
        }
      );
    }
  };
};
