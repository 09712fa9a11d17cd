import type { FastifyInstance, FastifyError } from 'fastify';
import type { Config } from '../../../infrastructure/config/config.js';
import type { Logger } from '../../../application/ports/driven/logger-port.js';
import { AppError, ValidationError } from '../../../domain/errors/app-error.js';

const BODY_PARSE_ERROR_CODES = new Set(['FST_ERR_CTP_EMPTY_JSON_BODY', 'FST_ERR_CTP_INVALID_JSON_BODY']);

/**
 * Corpo JSON vazio ou malformado é erro de validação do campo body (422).
 * O parser JSON do Fastify 4 repassa o SyntaxError com statusCode 400 e sem code.
 */
function toBodyValidationError(error: FastifyError): ValidationError | undefined {
  const isBodyParseError =
    BODY_PARSE_ERROR_CODES.has(error.code) || (error instanceof SyntaxError && error.statusCode === 400);

  return isBodyParseError ? new ValidationError([{ field: 'body', message: error.message }], error) : undefined;
}

/**
 * Registrado direto na instância raiz (sem register) para valer em todas as rotas
 */
export function registerErrorHandler(app: FastifyInstance, config: Config, logger: Logger): void {
  app.setErrorHandler((thrown: FastifyError | AppError, request, reply) => {
    const requestId = request.id;
    const error = thrown instanceof AppError ? thrown : toBodyValidationError(thrown) ?? thrown;

    // Log do erro
    const errorContext = {
      requestId,
      method: request.method,
      url: request.url,
      statusCode: error.statusCode ?? 500,
      code: error.code,
    };

    if (error instanceof AppError) {
      const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log(
        {
          ...errorContext,
          error: {
            name: error.name,
            message: error.message,
            code: error.code,
            cause: error.cause?.message,
          },
        },
        'Application error'
      );

      // Resposta ao cliente
      return reply.status(error.statusCode).send({
        error: {
          code: error.code ?? 'APP_ERROR',
          message: error.message,
          requestId,
          ...(error instanceof ValidationError && { details: error.details }),
        },
      });
    }

    logger.error(
      {
        ...errorContext,
        error: {
          name: error.name,
          message: error.message,
          stack: config.nodeEnv === 'development' ? error.stack : undefined,
        },
      },
      'Unhandled error'
    );

    // Erro não tratado
    const statusCode = error.statusCode ?? 500;
    const message =
      config.nodeEnv === 'production' && statusCode >= 500
        ? 'Internal server error'
        : error.message;

    return reply.status(statusCode).send({
      error: {
        code: error.code ?? 'INTERNAL_ERROR',
        message,
        requestId,
        ...(config.nodeEnv === 'development' && { stack: error.stack }),
      },
    });
  });
}
