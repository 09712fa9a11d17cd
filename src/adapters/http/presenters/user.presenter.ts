import type { User } from '../../../domain/entities/user.js';

/**
 * Representação JSON do usuário (snake_case, timestamps ISO-8601)
 */
export interface UserResponse {
  id: number;
  name: string;
  email: string;
  age: number;
  bio: string | null;
  created_at: string;
  updated_at: string;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    age: user.age,
    bio: user.bio,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}
