import type Database from 'better-sqlite3';
import { loadConfig } from './infrastructure/config/config.js';
import { PinoLogger } from './infrastructure/logging/pino-logger.js';
import type { UserRepository } from './application/ports/driven/index.js';
import { openDatabase } from './adapters/sqlite/sqlite-database.js';
import { SqliteUserRepository } from './adapters/sqlite/sqlite-user-repository.js';
import { InMemoryUserRepository } from './adapters/in-memory/in-memory-user-repository.js';

// Use Cases da camada de aplicação
import {
  CreateUserUseCase,
  GetUserUseCase,
  ListUsersUseCase,
  ReplaceUserUseCase,
  PartialUpdateUserUseCase,
  DeleteUserUseCase,
  SearchUsersUseCase,
} from './application/use-cases/index.js';

// Services
import { UserService } from './application/services/user-service.js';

import { FastifyServer } from './adapters/http/fastify-server.js';

async function bootstrap() {
  // Carregar configuração
  const config = loadConfig();
  const logger = new PinoLogger(config.logLevel, config.serviceName, config.nodeEnv === 'development');

  logger.info({ nodeEnv: config.nodeEnv, databaseDriver: config.databaseDriver }, 'Inicializando aplicação');

  let db: Database.Database | undefined;

  try {
    // Inicializar repositório
    let userRepository: UserRepository;
    if (config.databaseDriver === 'sqlite') {
      db = openDatabase(config.databasePath, logger);
      userRepository = new SqliteUserRepository(db, logger);
    } else {
      userRepository = new InMemoryUserRepository(logger);
    }

    // Inicializar use cases
    const userService = new UserService(
      new CreateUserUseCase(userRepository, logger),
      new GetUserUseCase(userRepository, logger),
      new ListUsersUseCase(userRepository, logger),
      new ReplaceUserUseCase(userRepository, logger),
      new PartialUpdateUserUseCase(userRepository, logger),
      new DeleteUserUseCase(userRepository, logger),
      new SearchUsersUseCase(userRepository, logger)
    );

    // Inicializar servidor HTTP
    const server = await FastifyServer.create({ userService, config, logger });

    // Graceful shutdown
    const shutdown = async () => {
      logger.info({}, 'Encerrando aplicação...');
      await server.close();
      db?.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Erro ao encerrar aplicação');
        process.exit(1);
      });
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    // Iniciar servidor
    await server.listen();
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Erro fatal ao inicializar aplicação');
    db?.close();
    process.exit(1);
  }
}

bootstrap().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
