import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import { parseUserId } from '../dtos/user.dto.js';

/**
 * Use Case: Excluir usuário
 * - Remoção definitiva; o id não é reaproveitado
 */
export class DeleteUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(params: unknown, requestId: string): Promise<void> {
    const id = parseUserId(params);

    await this.userRepository.delete(id);

    this.logger.info({ requestId, userId: id }, 'Usuário excluído');
  }
}
