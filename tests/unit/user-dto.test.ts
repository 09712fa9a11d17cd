import { describe, it, expect } from 'vitest';
import {
  parseUserInput,
  parseUserPatch,
  parseListUsersQuery,
  parseUserId,
  parseSearchTerm,
} from '../../src/application/dtos/user.dto.js';
import { ValidationError } from '../../src/domain/errors/app-error.js';
import { captureValidationError } from '../helpers/mocks.js';

const validPayload = {
  name: 'John Doe',
  email: 'john@example.com',
  age: 30,
};

describe('User DTOs', () => {
  describe('parseUserInput', () => {
    it('deve aceitar payload válido e normalizar bio ausente para null', () => {
      expect(parseUserInput(validPayload)).toEqual({
        name: 'John Doe',
        email: 'john@example.com',
        age: 30,
        bio: null,
      });
    });

    it('deve manter bio informada', () => {
      expect(parseUserInput({ ...validPayload, bio: 'Hello' }).bio).toBe('Hello');
    });

    it('deve descartar campos desconhecidos', () => {
      const result = parseUserInput({ ...validPayload, id: 99, role: 'admin' });
      expect(Object.keys(result).sort()).toEqual(['age', 'bio', 'email', 'name']);
    });

    it('deve aceitar idades nos limites 0 e 150', () => {
      expect(parseUserInput({ ...validPayload, age: 0 }).age).toBe(0);
      expect(parseUserInput({ ...validPayload, age: 150 }).age).toBe(150);
    });

    it('deve rejeitar idades -1 e 151', () => {
      for (const age of [-1, 151]) {
        const error = captureValidationError(() => parseUserInput({ ...validPayload, age }));
        expect(error.details.map((issue) => issue.field)).toEqual(['age']);
      }
    });

    it('deve rejeitar idade não inteira', () => {
      const error = captureValidationError(() => parseUserInput({ ...validPayload, age: 30.5 }));
      expect(error.details.map((issue) => issue.field)).toEqual(['age']);
    });

    it('deve aceitar bio com exatamente 500 caracteres e rejeitar 501', () => {
      expect(parseUserInput({ ...validPayload, bio: 'a'.repeat(500) }).bio).toHaveLength(500);

      const error = captureValidationError(() => parseUserInput({ ...validPayload, bio: 'a'.repeat(501) }));
      expect(error.details.map((issue) => issue.field)).toEqual(['bio']);
    });

    it('deve validar tamanho do nome (1 a 100)', () => {
      expect(parseUserInput({ ...validPayload, name: 'a'.repeat(100) }).name).toHaveLength(100);

      expect(() => parseUserInput({ ...validPayload, name: '' })).toThrow(ValidationError);
      expect(() => parseUserInput({ ...validPayload, name: 'a'.repeat(101) })).toThrow(ValidationError);
    });

    it('deve rejeitar email vazio mas não validar formato', () => {
      expect(() => parseUserInput({ ...validPayload, email: '' })).toThrow(ValidationError);
      expect(parseUserInput({ ...validPayload, email: 'not-an-email' }).email).toBe('not-an-email');
    });

    it('deve listar todos os campos obrigatórios ausentes', () => {
      const error = captureValidationError(() => parseUserInput({}));

      expect(error.message).toBe('Validation failed for field(s): name, email, age');
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('VALIDATION_ERROR');
    });

    it('deve reportar o campo body quando o payload não é objeto', () => {
      const error = captureValidationError(() => parseUserInput(null));
      expect(error.details.map((issue) => issue.field)).toEqual(['body']);
    });
  });

  describe('parseUserPatch', () => {
    it('deve retornar apenas as chaves enviadas', () => {
      const patch = parseUserPatch({ age: 40 });
      expect(patch).toEqual({ age: 40 });
      expect(Object.keys(patch)).toEqual(['age']);
    });

    it('deve aceitar patch vazio', () => {
      expect(parseUserPatch({})).toEqual({});
    });

    it('deve permitir limpar bio com null', () => {
      expect(parseUserPatch({ bio: null })).toEqual({ bio: null });
    });

    it('deve rejeitar null nos demais campos', () => {
      const error = captureValidationError(() => parseUserPatch({ name: null }));
      expect(error.details.map((issue) => issue.field)).toEqual(['name']);
    });

    it('deve aplicar as mesmas regras por campo do create', () => {
      const error = captureValidationError(() => parseUserPatch({ age: 151, bio: 'a'.repeat(501) }));
      expect(error.details.map((issue) => issue.field)).toEqual(['age', 'bio']);
    });
  });

  describe('parseListUsersQuery', () => {
    it('deve usar skip=0 e limit=100 por padrão', () => {
      expect(parseListUsersQuery(undefined)).toEqual({ skip: 0, limit: 100 });
      expect(parseListUsersQuery({})).toEqual({ skip: 0, limit: 100 });
    });

    it('deve converter query strings em números e mapear filtros', () => {
      expect(
        parseListUsersQuery({ skip: '2', limit: '2', name: 'Jo', min_age: '18', max_age: '65' })
      ).toEqual({ skip: 2, limit: 2, name: 'Jo', minAge: 18, maxAge: 65 });
    });

    it('deve ignorar filtro de nome vazio', () => {
      expect(parseListUsersQuery({ name: '' })).toEqual({ skip: 0, limit: 100 });
    });

    it('deve aceitar limit entre 1 e 1000', () => {
      expect(parseListUsersQuery({ limit: '1' }).limit).toBe(1);
      expect(parseListUsersQuery({ limit: '1000' }).limit).toBe(1000);

      for (const limit of ['0', '1001']) {
        const error = captureValidationError(() => parseListUsersQuery({ limit }));
        expect(error.details.map((issue) => issue.field)).toEqual(['limit']);
      }
    });

    it('deve rejeitar skip negativo e idades inválidas', () => {
      const error = captureValidationError(() =>
        parseListUsersQuery({ skip: '-1', min_age: 'abc', max_age: '-5' })
      );
      expect(error.details.map((issue) => issue.field)).toEqual(['skip', 'min_age', 'max_age']);
    });

    it('deve rejeitar números vazios, hexadecimais e em notação científica', () => {
      const error = captureValidationError(() =>
        parseListUsersQuery({ skip: '', min_age: '0x10', max_age: '1e1' })
      );
      expect(error.details).toEqual([
        { field: 'skip', message: 'Expected a non-negative integer' },
        { field: 'min_age', message: 'Expected a non-negative integer' },
        { field: 'max_age', message: 'Expected a non-negative integer' },
      ]);
    });

    it('deve aceitar skip maior que o maior inteiro seguro', () => {
      expect(parseListUsersQuery({ skip: '100000000000000000000' }).skip).toBe(1e20);
    });
  });

  describe('parseUserId', () => {
    it('deve converter id da rota para número', () => {
      expect(parseUserId({ id: '5' })).toBe(5);
    });

    it('deve rejeitar id não positivo ou não inteiro', () => {
      for (const id of ['0', '-3', 'abc', '1.5', '', '0x1', '1e1']) {
        const error = captureValidationError(() => parseUserId({ id }));
        expect(error.details.map((issue) => issue.field)).toEqual(['id']);
      }
    });
  });

  describe('parseSearchTerm', () => {
    it('deve retornar o termo informado', () => {
      expect(parseSearchTerm({ term: 'john' })).toBe('john');
    });

    it('deve rejeitar termo vazio', () => {
      const error = captureValidationError(() => parseSearchTerm({ term: '' }));
      expect(error.details.map((issue) => issue.field)).toEqual(['term']);
    });
  });
});
