import { FastifyInstance } from 'fastify';
import { ToolRegistry } from './registry';
import { ToolRuntime } from './runtime';
import { isJsonObject } from '../reference/types';

interface ToolParams {
  name: string;
}

export function registerToolRoutes(app: FastifyInstance, registry: ToolRegistry, runtime: ToolRuntime): void {
  /** Published tool catalogue */
  app.get('/tools', async (_req, reply) => {
    return reply.send({ tools: registry.describe() });
  });

  /** Invoke a tool; the body is its argument object */
  app.post<{ Params: ToolParams; Body: unknown }>('/tools/:name', async (req, reply) => {
    const { name } = req.params;
    if (!registry.has(name)) {
      return reply.status(404).send({ success: false, error: `Unknown tool: ${name}`, errorKind: 'unknown_tool' });
    }

    const args = isJsonObject(req.body) ? req.body : {};
    const result = await runtime.execute(name, args, { requestId: req.id });
    const status = !result.success && result.errorKind === 'invalid_input' ? 400 : 200;
    return reply.status(status).send(result);
  });
}
