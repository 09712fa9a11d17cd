import { z } from 'zod';

const configSchema = z.object({
  // Server
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().int().positive().default(8000),
  host: z.string().default('0.0.0.0'),

  // Database
  databaseDriver: z.enum(['sqlite', 'memory']).default('sqlite'),
  databasePath: z.string().min(1).default('./users.db'),

  // Observability
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  serviceName: z.string().default('user-management-api'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const config = {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      host: env.HOST,
      databaseDriver: env.DATABASE_DRIVER,
      databasePath: env.DATABASE_PATH,
      logLevel: env.LOG_LEVEL,
      serviceName: env.SERVICE_NAME,
    };

    return configSchema.parse(config);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missingVars = error.errors.map((e) => e.path.map(String).join('.')).join(', ');
      throw new Error(`Configuração inválida. Variáveis faltando ou inválidas: ${missingVars}`);
    }
    throw error;
  }
}
