import type { UserRepository } from '../ports/driven/user-repository.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { User } from '../../domain/entities/user.js';
import { parseUserId, parseUserPatch } from '../dtos/user.dto.js';

/**
 * Use Case: Atualização parcial (PATCH)
 * - Só os campos enviados são validados e aplicados
 * - Campos ausentes ficam intocados
 */
export class PartialUpdateUserUseCase {
  constructor(
    private userRepository: UserRepository,
    private logger: Logger
  ) {}

  async execute(params: unknown, payload: unknown, requestId: string): Promise<User> {
    const id = parseUserId(params);
    const patch = parseUserPatch(payload);

    const user = await this.userRepository.partialUpdate(id, patch);

    this.logger.info({ requestId, userId: id, fields: Object.keys(patch) }, 'Usuário atualizado parcialmente');
    return user;
  }
}
