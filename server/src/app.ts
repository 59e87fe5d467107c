import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from './logger';
import { AUTH_HEADER } from './service/collaboratorHttp';
import type { PersonalIndexTaskRunner } from './service/personalIndexTaskRunner';
import { registerPersonalIndexRoutes } from './routes/personalIndex';

interface CreateAppOptions {
  runner: Pick<
    PersonalIndexTaskRunner,
    'submit' | 'getTask' | 'activeCount' | 'pendingCount' | 'closed'
  >;
  authToken: string;
  corsOrigins?: string[];
}

export const createApp = ({
  runner,
  authToken,
  corsOrigins = ['*'],
}: CreateAppOptions) => {
  const app = new Hono();

  app.use(
    '/*',
    cors({
      origin: corsOrigins.includes('*') ? '*' : corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', AUTH_HEADER, 'Authorization'],
      maxAge: 86400,
    })
  );

  app.use('*', async (c, next) => {
    logger.log(`[${c.req.method}] ${c.req.path}`);
    await next();
  });

  app.get('/', (c) => {
    return c.text('Personal CPI calculation service');
  });

  app.get('/health', (c) => {
    return c.json({
      status: runner.closed ? 'shutting_down' : 'ok',
      activeTasks: runner.activeCount,
      pendingTasks: runner.pendingCount,
    });
  });

  registerPersonalIndexRoutes(app, { runner, authToken });

  return app;
};
