import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseSearchTerm } from '../dtos/user.dto.js';

/**
 * Use Case: Buscar usuários por nome OU email
 * - Termo vazio é rejeitado aqui; o repositório trataria como "todos"
 */
export class SearchUsersUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(params: unknown, requestId: string): Promise<User[]> {
    const term = parseSearchTerm(params);

    const users = await this.userRepository.search(term);

    this.logger.debug({ requestId, count: users.length }, 'Busca de usuários concluída');
    return users;
  }
}
