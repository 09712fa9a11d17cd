import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseUserId } from '../dtos/user.dto.js';

export class GetUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(params: unknown, requestId: string): Promise<User> {
    const id = parseUserId(params);

    const user = await this.userRepository.get(id);

    this.logger.debug({ requestId, userId: id }, 'Usuário encontrado');
    return user;
  }
}
