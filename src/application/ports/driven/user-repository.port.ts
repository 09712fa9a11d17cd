import type { User, UserInput, UserListFilters, UserPatch } from '../../../domain/entities/user.js';

/**
 * Port: Repositório de Usuários
 *
 * Dono da representação persistida do usuário e da unicidade do email.
 * Todas as operações de escrita são atômicas (checagem + escrita).
 */
export interface UserRepository {
  /**
   * Cria usuário com id novo e createdAt = updatedAt = agora
   * @throws ConflictError se o email já existir
   */
  create(input: UserInput): Promise<User>;

  /**
   * @throws NotFoundError se o id não existir
   */
  get(id: number): Promise<User>;

  /**
   * Lista usuários que atendem a TODOS os filtros informados, em ordem de id
   */
  list(filters: UserListFilters): Promise<User[]>;

  /**
   * Sobrescreve todos os campos editáveis
   * @throws NotFoundError se o id não existir
   * @throws ConflictError se o novo email pertencer a outro usuário
   */
  replace(id: number, input: UserInput): Promise<User>;

  /**
   * Aplica apenas as chaves presentes em `patch`
   * @throws NotFoundError se o id não existir
   * @throws ConflictError se o novo email pertencer a outro usuário
   */
  partialUpdate(id: number, patch: UserPatch): Promise<User>;

  /**
   * Remoção definitiva (sem soft-delete)
   * @throws NotFoundError se o id não existir
   */
  delete(id: number): Promise<void>;

  /**
   * Usuários cujo nome OU email contém o termo. Termo vazio retorna todos.
   */
  search(term: string): Promise<User[]>;
}

export type Clock = () => Date;
