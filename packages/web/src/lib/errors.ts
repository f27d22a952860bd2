import { ApiRequestError } from './api';

export function humanizeError(err: unknown): string {
  if (err instanceof ApiRequestError) {
    const { code, message } = err.apiError;
    if (code === 'RATE_LIMIT') return 'Demasiados pedidos. Tente novamente dentro de momentos.';
    if (code === 'GENERATION_FAILED') return 'A geração falhou, tente novamente.';
    if (code === 'DUPLICATE_USER') return 'Esse utilizador já existe.';
    if (code === 'FORBIDDEN') return 'Sem permissão para esta ação.';
    if (code === 'INVALID_REQUEST') return message || 'Pedido inválido.';
    return message || `Erro (${code})`;
  }
  if (err instanceof Error) return err.message;
  return 'Erro desconhecido';
}

export function isUnauthorized(err: unknown): boolean {
  return err instanceof ApiRequestError && err.status === 401;
}
