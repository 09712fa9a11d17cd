import { describe, it, expect } from 'vitest';
import { maskEmail, sanitizeForLogs } from '../../src/domain/helpers/log-sanitizer.js';

describe('Log sanitizer', () => {
  describe('maskEmail', () => {
    it('deve manter só a primeira letra e o domínio', () => {
      expect(maskEmail('john.doe@example.com')).toBe('j***@example.com');
    });

    it('deve mascarar tudo quando não há @', () => {
      expect(maskEmail('not-an-email')).toBe('***');
    });

    it('deve lidar com parte local vazia', () => {
      expect(maskEmail('@example.com')).toBe('***@example.com');
    });
  });

  describe('sanitizeForLogs', () => {
    it('deve remover headers de autenticação', () => {
      const context = {
        requestId: 'req-1',
        headers: {
          authorization: 'Bearer test-token',
          'x-api-key': 'test-key',
          'x-user-id': '42',
          'content-type': 'application/json',
        },
      };

      expect(sanitizeForLogs(context)).toEqual({
        requestId: 'req-1',
        headers: {
          'x-user-id': '42',
          'content-type': 'application/json',
        },
      });
    });

    it('deve mascarar emails e ignorar maiúsculas nas chaves', () => {
      expect(sanitizeForLogs({ userId: 1, Email: 'bob@example.io', Authorization: 'x' })).toEqual({
        userId: 1,
        Email: 'b***@example.io',
      });
    });

    it('deve sanitizar objetos dentro de arrays', () => {
      expect(sanitizeForLogs({ users: [{ email: 'a@b.com', password: 'test-password' }, 'plain'] })).toEqual({
        users: [{ email: 'a***@b.com' }, 'plain'],
      });
    });

    it('não deve mutar o objeto original', () => {
      const context = { email: 'jane@example.com', token: 'test-token' };

      sanitizeForLogs(context);

      expect(context).toEqual({ email: 'jane@example.com', token: 'test-token' });
    });

    it('deve preservar datas e erros', () => {
      const at = new Date('2024-01-01T00:00:00.000Z');
      const error = new Error('boom');

      const result = sanitizeForLogs({ at, error });

      expect(result.at).toBe(at);
      expect(result.error).toBe(error);
    });
  });
});
