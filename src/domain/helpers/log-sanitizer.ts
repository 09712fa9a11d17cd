/**
 * Helpers para não vazar dados pessoais e credenciais nos logs
 */

const SENSITIVE_FIELDS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'apikey',
  'api_key',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'password',
  'senha',
  'secret',
]);

const EMAIL_FIELDS = new Set(['email', 'useremail', 'user_email']);

/**
 * Mascara email mantendo só a primeira letra e o domínio: j***@example.com
 */
export function maskEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at < 0) {
    return '***';
  }

  const local = email.substring(0, at);
  const domain = email.substring(at + 1);
  const first = local.length > 0 ? local[0] : '';
  return `${first}***@${domain}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date) && !(value instanceof Error);
}

function sanitizeValue(value: unknown): unknown {
  if (isPlainObject(value)) {
    return sanitizeForLogs(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }
  return value;
}

/**
 * Retorna cópia do objeto sem campos sensíveis e com emails mascarados.
 * Não muta o objeto original.
 */
export function sanitizeForLogs(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_FIELDS.has(lowerKey)) {
      continue;
    }

    if (EMAIL_FIELDS.has(lowerKey) && typeof value === 'string') {
      sanitized[key] = maskEmail(value);
      continue;
    }

    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}
