import Fastify from 'fastify';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { fastifyRequestContext } from '@fastify/request-context';
import { randomUUID } from 'crypto';
import type { UserService } from '../../application/services/user-service.js';
import type { Config } from '../../infrastructure/config/config.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import { registerErrorHandler } from './plugins/error-handler.js';
import { userRoutes } from './routes/user.routes.js';

declare module '@fastify/request-context' {
  interface RequestContextData {
    requestId: string;
  }
}

export interface AppDependencies {
  userService: UserService;
  config: Config;
  logger: Logger;
}

export class FastifyServer {
  private app: FastifyInstance;
  private dependencies: AppDependencies;

  private constructor(dependencies: AppDependencies) {
    this.dependencies = dependencies;
    this.app = Fastify({
      logger: false,
      requestIdHeader: 'x-request-id',
      genReqId: () => randomUUID(),
    });
  }

  static async create(dependencies: AppDependencies): Promise<FastifyServer> {
    const server = new FastifyServer(dependencies);

    // Error handler (deve ser registrado antes das rotas)
    registerErrorHandler(server.app, dependencies.config, dependencies.logger);
    await server.setupMiddleware();
    server.setupRoutes();

    return server;
  }

  private async setupMiddleware(): Promise<void> {
    // Request Context precisa estar carregado antes dos hooks que o usam
    await this.app.register(fastifyRequestContext);

    this.app.addHook('onRequest', async (request: FastifyRequest) => {
      request.requestContext.set('requestId', request.id);

      // Headers de auth são removidos pelo sanitizer do logger
      this.dependencies.logger.debug(
        { requestId: request.id, method: request.method, url: request.url, headers: request.headers },
        'Request recebido'
      );
    });

    this.app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
      this.dependencies.logger.info(
        {
          requestId: request.id,
          method: request.method,
          url: request.url,
          statusCode: reply.statusCode,
          responseTimeMs: reply.elapsedTime,
        },
        'Request completed'
      );
    });
  }

  private setupRoutes(): void {
    // Root route
    this.app.get('/', async () => {
      return {
        message: 'Welcome to User Management API',
        version: '1.0.0',
        documentation: '/health',
      };
    });

    // Health check
    this.app.get('/health', async () => {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: this.dependencies.config.serviceName,
      };
    });

    this.app.register(userRoutes, { userService: this.dependencies.userService });
  }

  getInstance(): FastifyInstance {
    return this.app;
  }

  async listen(): Promise<void> {
    await this.app.listen({
      port: this.dependencies.config.port,
      host: this.dependencies.config.host,
    });
    this.dependencies.logger.info(
      { port: this.dependencies.config.port, host: this.dependencies.config.host },
      'Servidor HTTP iniciado'
    );
  }

  async close(): Promise<void> {
    await this.app.close();
  }
}
