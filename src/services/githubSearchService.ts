import axios from 'axios';
import { API_BASE, SEARCH_PATH } from '@/config';
import { decodeSearchResponse } from '@/utils/decodeRepositories';
import { parseLastPage } from '@/utils/linkHeader';
import type { SearchPage } from '@/types/search';
import { TransportError } from './errors';

/**
 * GitHub repository search client.
 *
 * One request per call: no retries, no timeout, no pagination. The `Link`
 * header's last page is reported but never followed.
 */

function headerValue(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

async function fetchSearchPage(query: string) {
  try {
    return await axios.get<unknown>(`${API_BASE}${SEARCH_PATH}`, {
      params: { q: query },
      headers: { Accept: 'application/vnd.github+json' },
    });
  } catch (err) {
    if (axios.isAxiosError(err)) {
      throw new TransportError(err.message, err.response?.status);
    }
    throw new TransportError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Run a repository search.
 *
 * @throws TransportError when the request fails or the API answers non-2xx
 * @throws DecodeError when the body is missing a required field
 */
export async function searchRepositories(query: string): Promise<SearchPage> {
  const response = await fetchSearchPage(query);
  const { totalCount, records } = decodeSearchResponse(response.data);

  return {
    totalCount,
    records,
    lastPage: parseLastPage(headerValue(response.headers['link'])),
  };
}
