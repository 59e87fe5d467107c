import { timingSafeEqual } from 'node:crypto';
import type { Hono } from 'hono';
import { logger } from '../logger';
import type {
  PersonalIndexTaskSnapshot,
  RequestIdentifier,
} from '../model/personalIndex';
import { AUTH_HEADER } from '../service/collaboratorHttp';
import { describeError, TaskRunnerClosedError } from '../service/errors';
import type { PersonalIndexTaskRunner } from '../service/personalIndexTaskRunner';

interface RegisterPersonalIndexRoutesOptions {
  runner: Pick<PersonalIndexTaskRunner, 'submit' | 'getTask'>;
  authToken: string;
}

export const PERSONAL_INDEX_BASE_PATH = '/api/v1/personal-cpi';

export const tokensMatch = (provided: unknown, expected: string): boolean => {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

const toRequestIdentifier = (pk: unknown): RequestIdentifier | null => {
  if (typeof pk === 'number' && Number.isFinite(pk)) return String(pk);
  if (typeof pk === 'string' && pk.trim() !== '') return pk.trim();
  return null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const taskToStatusPayload = (task: PersonalIndexTaskSnapshot) => ({
  taskId: task.taskId,
  requestId: task.requestId,
  status: task.status,
  delivery: task.delivery,
  submittedAt: task.submittedAt.toISOString(),
  startedAt: task.startedAt?.toISOString() ?? null,
  completedAt: task.completedAt?.toISOString() ?? null,
  personalCPI: task.outcome?.personalIndex ?? null,
  success: task.outcome?.success ?? null,
  error: task.error ?? null,
});

export const registerPersonalIndexRoutes = (
  app: Hono,
  { runner, authToken }: RegisterPersonalIndexRoutesOptions
) => {
  app.post(PERSONAL_INDEX_BASE_PATH, async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (parseError) {
      logger.warn('Received empty or malformed request body:', parseError);
      return c.json({ error: 'Request body is empty' }, 400);
    }

    if (!isRecord(body) || Object.keys(body).length === 0) {
      return c.json({ error: 'Request body is empty' }, 400);
    }
    if (!('pk' in body) || !('token' in body)) {
      return c.json({ error: 'Missing required fields: pk and token' }, 400);
    }
    if (!tokensMatch(body.token, authToken)) {
      return c.json({ error: 'Invalid token' }, 401);
    }

    const requestId = toRequestIdentifier(body.pk);
    if (requestId === null) {
      return c.json({ error: 'pk must be a non-empty string or number' }, 400);
    }

    try {
      const task = runner.submit(requestId);
      logger.log(`Async task started for request ${requestId}`, {
        taskId: task.taskId,
      });
      return c.json({
        message: `Processing started for request ${requestId}`,
        taskId: task.taskId,
      });
    } catch (error) {
      if (error instanceof TaskRunnerClosedError) {
        return c.json({ error: error.message }, 503);
      }
      logger.error('Error in personal CPI trigger:', error);
      return c.json(
        { error: `Internal server error: ${describeError(error)}` },
        500
      );
    }
  });

  app.get(`${PERSONAL_INDEX_BASE_PATH}/tasks/:taskId`, (c) => {
    if (!tokensMatch(c.req.header(AUTH_HEADER), authToken)) {
      return c.json({ error: 'Invalid token' }, 401);
    }

    const task = runner.getTask(c.req.param('taskId'));
    if (!task) {
      return c.json({ error: 'Task not found' }, 404);
    }
    return c.json(taskToStatusPayload(task));
  });
};
