import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseListUsersQuery } from '../dtos/user.dto.js';

/**
 * Use Case: Listar usuários
 * - Paginação (skip/limit) e filtros combinados com AND
 * - name: substring; min_age/max_age: limites inclusivos
 */
export class ListUsersUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(query: unknown, requestId: string): Promise<User[]> {
    const filters = parseListUsersQuery(query);

    const users = await this.userRepository.list(filters);

    this.logger.debug({ requestId, filters, count: users.length }, 'Usuários listados');
    return users;
  }
}
