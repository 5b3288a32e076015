import { ExternalServiceError } from '@/lib/utils/errors';

// Max characters sent to an embedding API
export const MAX_EMBED_CHARS = 8000;

/**
 * Trim and length-limit a query before it is embedded.
 */
export function prepareText(service: string, text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ExternalServiceError(service, 'Cannot embed empty text', { kind: 'permanent' });
  }

  if (trimmed.length > MAX_EMBED_CHARS) {
    console.warn(`[Embedder] Text too long (${trimmed.length} chars), truncating to ${MAX_EMBED_CHARS}`);
    return trimmed.slice(0, MAX_EMBED_CHARS);
  }

  return trimmed;
}
