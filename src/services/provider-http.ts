import type { z } from 'zod';
import { ProviderError, errorMessage, type LocationOperation } from '../errors.js';

export interface ProviderRequest<T> {
  provider: string;
  operation: LocationOperation;
  url: URL;
  schema: z.ZodType<T>;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * GET a vendor endpoint and parse the JSON body against `schema`.
 *
 * The request is bounded by `timeoutMs` and by the caller's signal. A
 * cancelled caller gets the signal's reason; every other failure becomes a
 * ProviderError.
 */
export async function fetchProviderJson<T>(request: ProviderRequest<T>): Promise<T> {
  const { provider, operation } = request;
  const timeoutSignal = AbortSignal.timeout(request.timeoutMs);
  const signal = request.signal
    ? AbortSignal.any([request.signal, timeoutSignal])
    : timeoutSignal;

  let response: Response;
  try {
    response = await fetch(request.url.toString(), {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal,
    });
  } catch (error) {
    request.signal?.throwIfAborted();
    throw new ProviderError(provider, operation, errorMessage(error), { cause: error });
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new ProviderError(provider, operation, `${response.status} - ${errorText}`, {
      status: response.status,
    });
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    request.signal?.throwIfAborted();
    throw new ProviderError(provider, operation, 'response body is not valid JSON', { cause: error });
  }

  const parsed = request.schema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderError(provider, operation, `unexpected response shape: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  return parsed.data;
}
