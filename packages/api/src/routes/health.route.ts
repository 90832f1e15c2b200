import type { FastifyInstance } from 'fastify';

const CHECK_TIMEOUT_MS = 3000;

export function registerHealthRoutes(
  app: FastifyInstance,
  checkDatabase: () => Promise<unknown>,
): void {
  app.get('/health', async (request, reply) => {
    let dbStatus: 'ok' | 'error' = 'error';

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error('timeout')), CHECK_TIMEOUT_MS);
      });
      await Promise.race([checkDatabase(), timeoutPromise]);
      dbStatus = 'ok';
    } catch (error) {
      request.log.warn({ err: error }, 'Database health check failed');
    } finally {
      clearTimeout(timer);
    }

    const status = dbStatus === 'ok' ? 'ok' : 'degraded';
    const statusCode = dbStatus === 'ok' ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks: {
        database: dbStatus,
      },
    });
  });
}
