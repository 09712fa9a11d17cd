export interface User {
  id: number;
  name: string;
  email: string;
  age: number;
  bio: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Campos editáveis pelo cliente (create/replace)
 */
export type UserInput = Pick<User, 'name' | 'email' | 'age' | 'bio'>;

/**
 * Atualização parcial: só as chaves presentes são aplicadas
 */
export type UserPatch = Partial<UserInput>;

export interface UserListFilters {
  skip: number;
  limit: number;
  name?: string;
  minAge?: number;
  maxAge?: number;
}
