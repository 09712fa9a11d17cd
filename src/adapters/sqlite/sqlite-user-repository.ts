import Database from 'better-sqlite3';
import type { Clock, UserRepository } from '../../application/ports/driven/user-repository.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { User, UserInput, UserListFilters, UserPatch } from '../../domain/entities/user.js';
import { AppError, ConflictError, InternalServerError, NotFoundError } from '../../domain/errors/app-error.js';

interface UserRow {
  id: number;
  name: string;
  email: string;
  age: number;
  bio: string | null;
  created_at: string;
  updated_at: string;
}

const USER_COLUMNS = 'id, name, email, age, bio, created_at, updated_at';

// Colunas que um patch pode alterar
const PATCHABLE_COLUMNS = ['name', 'email', 'age', 'bio'] as const;

/**
 * Escapa curingas do LIKE para que o termo seja tratado como substring literal
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    age: row.age,
    bio: row.bio,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Implementação do UserRepository sobre better-sqlite3
 *
 * Cada escrita roda dentro de db.transaction(), então checagem de email
 * e escrita são atômicas. O índice UNIQUE em email cobre o resto.
 * LIKE do SQLite é case-insensitive apenas para ASCII.
 */
export class SqliteUserRepository implements UserRepository {
  constructor(
    private db: Database.Database,
    private logger: Logger,
    private clock: Clock = () => new Date()
  ) {}

  async create(input: UserInput): Promise<User> {
    return this.write('create', () => {
      if (this.findIdByEmail(input.email) !== undefined) {
        throw new ConflictError();
      }

      const now = this.clock().toISOString();
      const result = this.db
        .prepare<[string, string, number, string | null, string, string]>(
          'INSERT INTO users (name, email, age, bio, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)'
        )
        .run(input.name, input.email, input.age, input.bio, now, now);

      return this.getOrThrow(Number(result.lastInsertRowid));
    });
  }

  async get(id: number): Promise<User> {
    return this.getOrThrow(id);
  }

  async list(filters: UserListFilters): Promise<User[]> {
    let query = `SELECT ${USER_COLUMNS} FROM users WHERE 1=1`;
    const params: (string | number)[] = [];

    if (filters.name) {
      query += " AND name LIKE ? ESCAPE '\\'";
      params.push(`%${escapeLike(filters.name)}%`);
    }
    if (filters.minAge !== undefined) {
      query += ' AND age >= ?';
      params.push(filters.minAge);
    }
    if (filters.maxAge !== undefined) {
      query += ' AND age <= ?';
      params.push(filters.maxAge);
    }

    // OFFSET precisa caber em int64; acima disso a página já é vazia
    query += ' ORDER BY id ASC LIMIT ? OFFSET ?';
    params.push(filters.limit, Math.min(filters.skip, Number.MAX_SAFE_INTEGER));

    const rows = this.read('list', () => this.db.prepare<(string | number)[], UserRow>(query).all(...params));
    return rows.map(toUser);
  }

  async replace(id: number, input: UserInput): Promise<User> {
    return this.write('replace', () => {
      const current = this.getOrThrow(id);
      this.assertEmailAvailable(current, input.email);

      this.db
        .prepare<[string, string, number, string | null, string, number]>(
          'UPDATE users SET name = ?, email = ?, age = ?, bio = ?, updated_at = ? WHERE id = ?'
        )
        .run(input.name, input.email, input.age, input.bio, this.clock().toISOString(), id);

      return this.getOrThrow(id);
    });
  }

  async partialUpdate(id: number, patch: UserPatch): Promise<User> {
    return this.write('partialUpdate', () => {
      const current = this.getOrThrow(id);
      if (patch.email !== undefined) {
        this.assertEmailAvailable(current, patch.email);
      }

      const assignments: string[] = [];
      const params: (string | number | null)[] = [];
      for (const column of PATCHABLE_COLUMNS) {
        const value = patch[column];
        if (value !== undefined) {
          assignments.push(`${column} = ?`);
          params.push(value);
        }
      }
      assignments.push('updated_at = ?');
      params.push(this.clock().toISOString(), id);

      this.db
        .prepare<(string | number | null)[]>(`UPDATE users SET ${assignments.join(', ')} WHERE id = ?`)
        .run(...params);

      return this.getOrThrow(id);
    });
  }

  async delete(id: number): Promise<void> {
    const result = this.write('delete', () =>
      this.db.prepare<[number]>('DELETE FROM users WHERE id = ?').run(id)
    );

    if (result.changes === 0) {
      throw new NotFoundError();
    }
  }

  async search(term: string): Promise<User[]> {
    const pattern = `%${escapeLike(term)}%`;
    const rows = this.read('search', () =>
      this.db
        .prepare<[string, string], UserRow>(
          `SELECT ${USER_COLUMNS} FROM users WHERE name LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\' ORDER BY id ASC`
        )
        .all(pattern, pattern)
    );
    return rows.map(toUser);
  }

  private getOrThrow(id: number): User {
    const row = this.read('get', () =>
      this.db.prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`).get(id)
    );
    if (!row) {
      throw new NotFoundError();
    }
    return toUser(row);
  }

  private findIdByEmail(email: string): number | undefined {
    const row = this.db.prepare<[string], { id: number }>('SELECT id FROM users WHERE email = ?').get(email);
    return row?.id;
  }

  private assertEmailAvailable(current: User, email: string): void {
    if (email === current.email) {
      return;
    }
    const ownerId = this.findIdByEmail(email);
    if (ownerId !== undefined && ownerId !== current.id) {
      throw new ConflictError();
    }
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  private write<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  private translateError(operation: string, error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    if (isUniqueViolation(error)) {
      return new ConflictError();
    }

    const cause = error instanceof Error ? error : undefined;
    this.logger.error({ operation, error: cause?.message }, 'Erro no repositório SQLite');
    return new InternalServerError(`Failed to ${operation} user`, cause);
  }
}
