import type {
  CreateUserUseCase,
  GetUserUseCase,
  ListUsersUseCase,
  ReplaceUserUseCase,
  PartialUpdateUserUseCase,
  DeleteUserUseCase,
  SearchUsersUseCase,
} from '../use-cases/index.js';
import type { User } from '../../domain/entities/user.js';

/**
 * UserService / Facade
 * Expõe os use cases de usuário para as rotas HTTP.
 * Entradas chegam cruas (body, params, query); cada use case valida.
 */
export class UserService {
  constructor(
    private createUserUseCase: CreateUserUseCase,
    private getUserUseCase: GetUserUseCase,
    private listUsersUseCase: ListUsersUseCase,
    private replaceUserUseCase: ReplaceUserUseCase,
    private partialUpdateUserUseCase: PartialUpdateUserUseCase,
    private deleteUserUseCase: DeleteUserUseCase,
    private searchUsersUseCase: SearchUsersUseCase
  ) {}

  async createUser(body: unknown, requestId: string): Promise<User> {
    return this.createUserUseCase.execute(body, requestId);
  }

  async getUser(params: unknown, requestId: string): Promise<User> {
    return this.getUserUseCase.execute(params, requestId);
  }

  async listUsers(query: unknown, requestId: string): Promise<User[]> {
    return this.listUsersUseCase.execute(query, requestId);
  }

  /**
   * PUT: substitui todos os campos
   */
  async replaceUser(params: unknown, body: unknown, requestId: string): Promise<User> {
    return this.replaceUserUseCase.execute(params, body, requestId);
  }

  /**
   * PATCH: aplica só os campos enviados
   */
  async partialUpdateUser(params: unknown, body: unknown, requestId: string): Promise<User> {
    return this.partialUpdateUserUseCase.execute(params, body, requestId);
  }

  async deleteUser(params: unknown, requestId: string): Promise<void> {
    await this.deleteUserUseCase.execute(params, requestId);
  }

  async searchUsers(params: unknown, requestId: string): Promise<User[]> {
    return this.searchUsersUseCase.execute(params, requestId);
  }
}
