import { jest } from '@jest/globals';
import { createApp } from '../app';
import type {
  FetchRequestData,
  PersonalIndexTaskSnapshot,
  ReportResult,
} from '../model/personalIndex';
import { TaskRunnerClosedError } from '../service/errors';
import {
  createPersonalIndexTaskRunner,
  type PersonalIndexTaskRunner,
  type TaskLogger,
} from '../service/personalIndexTaskRunner';

const AUTH_TOKEN = 'test-secret';

const jsonHeaders = {
  'Content-Type': 'application/json',
};

type RoutedRunner = Parameters<typeof createApp>[0]['runner'];

const queuedSnapshot = (requestId: string): PersonalIndexTaskSnapshot => ({
  taskId: 'task-1',
  requestId,
  status: 'QUEUED',
  delivery: 'PENDING',
  submittedAt: new Date('2025-03-01T10:00:00Z'),
});

const stubRunner = (overrides: Partial<RoutedRunner> = {}) => {
  const submit = jest.fn<PersonalIndexTaskRunner['submit']>(queuedSnapshot);
  const getTask = jest.fn<PersonalIndexTaskRunner['getTask']>(() => null);
  const runner: RoutedRunner = {
    submit,
    getTask,
    activeCount: 0,
    pendingCount: 0,
    closed: false,
    ...overrides,
  };
  return { runner, submit, getTask };
};

const postTrigger = (app: ReturnType<typeof createApp>, body?: string) =>
  app.request('/api/v1/personal-cpi', {
    method: 'POST',
    headers: jsonHeaders,
    body,
  });

const silentLogger = (): TaskLogger => ({
  log: jest.fn<TaskLogger['log']>(),
  warn: jest.fn<TaskLogger['warn']>(),
  error: jest.fn<TaskLogger['error']>(),
  debug: jest.fn<TaskLogger['debug']>(),
});

describe('Personal CPI trigger route', () => {
  test('acknowledges a valid trigger and submits the request id', async () => {
    const { runner, submit } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(
      app,
      JSON.stringify({ pk: 42, token: AUTH_TOKEN })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      message: 'Processing started for request 42',
      taskId: 'task-1',
    });
    expect(submit).toHaveBeenCalledWith('42');
  });

  test('rejects an empty or malformed body', async () => {
    const { runner, submit } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    for (const body of [undefined, '', '{}', 'not json']) {
      const response = await postTrigger(app, body);
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Request body is empty',
      });
    }
    expect(submit).not.toHaveBeenCalled();
  });

  test('requires both pk and token', async () => {
    const { runner } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(app, JSON.stringify({ pk: 1 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Missing required fields: pk and token',
    });
  });

  test('rejects a wrong token', async () => {
    const { runner, submit } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(
      app,
      JSON.stringify({ pk: 1, token: 'wrong-secret' })
    );

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: 'Invalid token' });
    expect(submit).not.toHaveBeenCalled();
  });

  test('rejects a blank pk', async () => {
    const { runner } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(
      app,
      JSON.stringify({ pk: '  ', token: AUTH_TOKEN })
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'pk must be a non-empty string or number',
    });
  });

  test('answers 503 once the runner is shut down', async () => {
    const { runner, submit } = stubRunner();
    submit.mockImplementation(() => {
      throw new TaskRunnerClosedError();
    });
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(
      app,
      JSON.stringify({ pk: 'abc', token: AUTH_TOKEN })
    );

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      error: 'Task runner has been shut down and no longer accepts requests',
    });
  });

  test('responds before the task has fetched anything', async () => {
    let releaseFetch: () => void = () => undefined;
    const fetchGate = new Promise<void>((resolve) => {
      releaseFetch = resolve;
    });
    const fetchRequestData = jest.fn<FetchRequestData>(async () => {
      await fetchGate;
      return {
        categories: [{ id: 'food', userSpent: 150, basePrice: 100 }],
        comparisonDate: '2024-01-01',
      };
    });
    const reportResult = jest.fn<ReportResult>(async () => undefined);
    const runner = createPersonalIndexTaskRunner({
      fetchRequestData,
      reportResult,
      simulatedDelayMs: 0,
      logger: silentLogger(),
    });
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await postTrigger(
      app,
      JSON.stringify({ pk: '15', token: AUTH_TOKEN })
    );
    const body: unknown = await response.json();
    const taskId =
      typeof body === 'object' && body !== null && 'taskId' in body
        ? String(body.taskId)
        : '';

    expect(response.status).toBe(200);
    expect(reportResult).not.toHaveBeenCalled();

    releaseFetch();
    await runner.onIdle();

    const statusResponse = await app.request(
      `/api/v1/personal-cpi/tasks/${taskId}`,
      { headers: { 'X-Auth-Token': AUTH_TOKEN } }
    );
    expect(statusResponse.status).toBe(200);
    expect(await statusResponse.json()).toMatchObject({
      taskId,
      requestId: '15',
      status: 'COMPLETED',
      delivery: 'DELIVERED',
      personalCPI: 50,
      success: true,
      error: null,
    });
  });
});

describe('Personal CPI task status route', () => {
  test('requires the shared secret', async () => {
    const { runner, getTask } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await app.request('/api/v1/personal-cpi/tasks/task-1');

    expect(response.status).toBe(401);
    expect(getTask).not.toHaveBeenCalled();
  });

  test('returns 404 for an unknown task', async () => {
    const { runner } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await app.request('/api/v1/personal-cpi/tasks/missing', {
      headers: { 'X-Auth-Token': AUTH_TOKEN },
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Task not found' });
  });

  test('serializes a queued snapshot', async () => {
    const { runner } = stubRunner({
      getTask: () => queuedSnapshot('42'),
    });
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await app.request('/api/v1/personal-cpi/tasks/task-1', {
      headers: { 'X-Auth-Token': AUTH_TOKEN },
    });

    expect(await response.json()).toEqual({
      taskId: 'task-1',
      requestId: '42',
      status: 'QUEUED',
      delivery: 'PENDING',
      submittedAt: '2025-03-01T10:00:00.000Z',
      startedAt: null,
      completedAt: null,
      personalCPI: null,
      success: null,
      error: null,
    });
  });
});

describe('Service routes', () => {
  test('answers CORS preflight for the trigger', async () => {
    const { runner } = stubRunner();
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await app.request('/api/v1/personal-cpi', {
      method: 'OPTIONS',
      headers: {
        Origin: 'http://frontend.test',
        'Access-Control-Request-Method': 'POST',
      },
    });

    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(response.headers.get('Access-Control-Allow-Headers')).toBe(
      'Content-Type,X-Auth-Token,Authorization'
    );
    expect(response.headers.get('Access-Control-Max-Age')).toBe('86400');
  });

  test('reports queue statistics on /health', async () => {
    const { runner } = stubRunner({ activeCount: 1, pendingCount: 3 });
    const app = createApp({ runner, authToken: AUTH_TOKEN });

    const response = await app.request('/health');

    expect(await response.json()).toEqual({
      status: 'ok',
      activeTasks: 1,
      pendingTasks: 3,
    });
  });
});
