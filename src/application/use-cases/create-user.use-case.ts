import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseUserInput } from '../dtos/user.dto.js';

/**
 * Use Case: Criar usuário
 * - Valida payload completo (name, email, age, bio)
 * - Repositório garante email único
 */
export class CreateUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(payload: unknown, requestId: string): Promise<User> {
    const input = parseUserInput(payload);

    const user = await this.userRepository.create(input);

    this.logger.info({ requestId, userId: user.id, email: user.email }, 'Usuário criado');
    return user;
  }
}
