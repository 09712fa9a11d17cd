import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseUserId, parseUserInput } from '../dtos/user.dto.js';

/**
 * Use Case: Substituir usuário (PUT)
 * - Todos os campos obrigatórios são revalidados e sobrescritos
 * - bio ausente vira null
 */
export class ReplaceUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(params: unknown, payload: unknown, requestId: string): Promise<User> {
    const id = parseUserId(params);
    const input = parseUserInput(payload);

    const user = await this.userRepository.replace(id, input);

    this.logger.info({ requestId, userId: id }, 'Usuário substituído');
    return user;
  }
}
