import type { Clock, UserRepository } from '../../application/ports/driven/user-repository.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { User, UserInput, UserListFilters, UserPatch } from '../../domain/entities/user.js';
import { ConflictError, NotFoundError } from '../../domain/errors/app-error.js';

/**
 * Igual ao LIKE do SQLite: só A-Z viram minúsculas
 */
function foldAsciiCase(value: string): string {
  return value.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

function contains(haystack: string, needle: string): boolean {
  return foldAsciiCase(haystack).includes(foldAsciiCase(needle));
}

// Datas são mutáveis: quem chama nunca recebe as instâncias guardadas no Map
function clone(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt), updatedAt: new Date(user.updatedAt) };
}

/**
 * Implementação em memória do UserRepository
 * Utilizada em desenvolvimento (DATABASE_DRIVER=memory) e nos testes
 *
 * Todas as operações alteram o estado de forma síncrona, sem await entre
 * a checagem de email e a escrita.
 */
export class InMemoryUserRepository implements UserRepository {
  private storage: Map<number, User> = new Map();
  private nextId = 1;

  constructor(
    private logger: Logger,
    private clock: Clock = () => new Date()
  ) {
    this.logger.info({}, 'InMemoryUserRepository inicializado');
  }

  async create(input: UserInput): Promise<User> {
    if (this.findByEmail(input.email)) {
      throw new ConflictError();
    }

    const now = this.clock();
    const user: User = { id: this.nextId++, ...input, createdAt: new Date(now), updatedAt: new Date(now) };
    this.storage.set(user.id, user);

    return clone(user);
  }

  async get(id: number): Promise<User> {
    return clone(this.getOrThrow(id));
  }

  async list(filters: UserListFilters): Promise<User[]> {
    const { skip, limit, name, minAge, maxAge } = filters;

    return this.ordered()
      .filter((user) => !name || contains(user.name, name))
      .filter((user) => minAge === undefined || user.age >= minAge)
      .filter((user) => maxAge === undefined || user.age <= maxAge)
      .slice(skip, skip + limit)
      .map(clone);
  }

  async replace(id: number, input: UserInput): Promise<User> {
    const current = this.getOrThrow(id);
    this.assertEmailAvailable(current, input.email);

    const updated: User = { ...current, ...input, updatedAt: new Date(this.clock()) };
    this.storage.set(id, updated);

    return clone(updated);
  }

  async partialUpdate(id: number, patch: UserPatch): Promise<User> {
    const current = this.getOrThrow(id);
    if (patch.email !== undefined) {
      this.assertEmailAvailable(current, patch.email);
    }

    const updated: User = { ...current, updatedAt: new Date(this.clock()) };
    if (patch.name !== undefined) updated.name = patch.name;
    if (patch.email !== undefined) updated.email = patch.email;
    if (patch.age !== undefined) updated.age = patch.age;
    if (patch.bio !== undefined) updated.bio = patch.bio;
    this.storage.set(id, updated);

    return clone(updated);
  }

  async delete(id: number): Promise<void> {
    if (!this.storage.delete(id)) {
      throw new NotFoundError();
    }
  }

  async search(term: string): Promise<User[]> {
    return this.ordered()
      .filter((user) => contains(user.name, term) || contains(user.email, term))
      .map(clone);
  }

  private ordered(): User[] {
    return [...this.storage.values()].sort((a, b) => a.id - b.id);
  }

  private getOrThrow(id: number): User {
    const user = this.storage.get(id);
    if (!user) {
      throw new NotFoundError();
    }
    return user;
  }

  private findByEmail(email: string): User | undefined {
    for (const user of this.storage.values()) {
      if (user.email === email) {
        return user;
      }
    }
    return undefined;
  }

  private assertEmailAvailable(current: User, email: string): void {
    const owner = this.findByEmail(email);
    if (owner && owner.id !== current.id) {
      throw new ConflictError();
    }
  }
}
