import { Hono, Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { streamSSE } from 'hono/streaming';
import { CreateJobRequestSchema, JobSnapshot, formatError } from '@streamvault/shared';
import { ArchiveService } from '../ArchiveService';
import { Subscription } from '../utils/Subscription';

function streamSnapshots(c: Context, subscription: Subscription<JobSnapshot>) {
  return streamSSE(c, async (stream) => {
    stream.onAbort(() => {
      subscription.close();
    });
    for await (const snapshot of subscription) {
      await stream.writeSSE({
        event: 'job',
        id: snapshot.id,
        data: JSON.stringify(snapshot)
      });
    }
  });
}

export function createAPIServer(service: ArchiveService) {
  const app = new Hono();
  const registry = service.registry;

  app.use('*', logger());

  // Enable CORS for development
  if (process.env.NODE_ENV === 'development') {
    app.use('*', cors({
      origin: process.env.CORS_ORIGIN || '*',
    }));
  }

  app.get('/health', (c: Context) => {
    try {
      const health = service.getHealthStatus();
      return c.json(health, health.status === 'healthy' ? 200 : 503);
    } catch (error) {
      return c.json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: formatError(error)
      }, 503);
    }
  });

  // Progress counters of the jobs shown in the task list
  app.get('/status', (c: Context) => {
    return c.json(registry.statusSummaries());
  });

  app.get('/jobs', (c: Context) => {
    return c.json(registry.visibleJobs().map((job) => job.snapshot()));
  });

  app.post('/jobs', async (c: Context) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = CreateJobRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: parsed.error.message }, 400);
    }

    try {
      const job = await service.addJob(parsed.data);
      return c.json(job.snapshot(), 201);
    } catch (error) {
      console.error('Error creating job:', formatError(error));
      return c.json({ error: formatError(error) }, 500);
    }
  });

  app.get('/jobs/:id', (c) => {
    const job = registry.getJob(c.req.param('id'));
    if (!job) {
      return c.json({ error: 'Task not found' }, 404);
    }
    return c.json(job.snapshot());
  });

  app.post('/jobs/:id/cancel', (c) => {
    const cancelled = service.cancelJob(c.req.param('id'));
    if (cancelled === null) {
      return c.json({ error: 'Task not found' }, 404);
    }
    if (!cancelled) {
      return c.json({ error: 'Task is not running' }, 409);
    }
    return c.json({ success: true });
  });

  app.delete('/jobs/:id/tempfiles', async (c) => {
    try {
      const result = await service.deleteTempFiles(c.req.param('id'));
      if (result.status === 'not-found') {
        return c.json({ error: 'Task not found' }, 404);
      }
      if (result.status === 'not-allowed') {
        return c.json({ error: 'Cannot delete temporary files on an unfinished job' }, 400);
      }
      return c.json({ success: true, files: result.files });
    } catch (error) {
      console.error('Error deleting temporary files:', formatError(error));
      return c.json({ error: formatError(error) }, 500);
    }
  });

  app.get('/events', (c: Context) => streamSnapshots(c, registry.subscribe()));

  app.get('/jobs/:id/events', (c) => {
    const id = c.req.param('id');
    if (!registry.getJob(id)) {
      return c.json({ error: 'Task not found' }, 404);
    }
    return streamSnapshots(c, registry.subscribeJob(id));
  });

  return app;
}
