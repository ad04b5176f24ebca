import useSWR from 'swr';
import { areaRequestToSearchParams } from './request';
import type { AreaAnalysis, AreaRequest } from './types';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function errorMessage(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return fallback;
}

async function jsonFetcher<T>(url: string): Promise<T> {
  const res = await fetch(url);
  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null);
    throw new ApiError(res.status, errorMessage(body, `${res.status} ${res.statusText}`));
  }
  return res.json() as Promise<T>;
}

export function insightUrl(request: AreaRequest): string {
  return `/api/insight?${areaRequestToSearchParams(request)}`;
}

/**
 * SWR hook for the area analysis. Pass null to skip fetching (no address
 * entered yet). The previous analysis stays on screen while the next loads.
 */
export function useAreaAnalysis(request: AreaRequest | null) {
  return useSWR<AreaAnalysis, ApiError>(
    request ? insightUrl(request) : null,
    jsonFetcher,
    {
      revalidateOnFocus: false,
      dedupingInterval: 60000,
      keepPreviousData: true,
    }
  );
}
