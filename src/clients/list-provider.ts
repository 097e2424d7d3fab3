/**
 * Contact-list directory client
 *
 * Fetches the smart lists of a location from a JSON:API service. Only
 * smart lists can be reused as a campaign audience, so every other list
 * type is dropped.
 */

import { z } from 'zod';
import { ListProviderError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { Location } from '../campaign/campaign-state';

export type ContactList = {
  id: string;
  name: string;
  /** Number of contacts currently in the list */
  size: number;
};

/** Returns the candidate lists for a location */
export type ListProvider = (location: Location | null) => Promise<ContactList[]>;

export interface HttpListProviderOptions {
  baseUrl: string;
  apiKey?: string;
  bearerToken?: string;
  timeoutMs: number;
  pageSize?: number;
  logger?: Logger;
  /** Injected fetch, mainly for tests */
  fetchImpl?: typeof fetch;
}

const ContactListResourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  attributes: z
    .object({
      name: z.string().nullish(),
      display_name: z.string().nullish(),
      list_type: z.string().nullish(),
      contacts_count: z.number().int().nonnegative().nullish(),
    })
    .default({}),
});

const ContactListDocumentSchema = z.object({
  data: z.array(ContactListResourceSchema).default([]),
});

/**
 * Create a list provider over the contact-list HTTP API
 *
 * `GET {baseUrl}/locations/{id}/contact_lists?page.size=N`
 *
 * Resolves to [] without a request when the location has no id.
 * @throws ListProviderError (from the returned function) on transport
 * errors, non-2xx responses and unexpected documents
 */
export function createHttpListProvider(
  options: HttpListProviderOptions
): ListProvider {
  const fetchImpl = options.fetchImpl ?? fetch;
  const logger = options.logger ?? silentLogger;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const pageSize = options.pageSize ?? 1000;

  return async (location) => {
    if (!location?.id) {
      logger.info('No location id; skipping contact-list lookup');
      return [];
    }

    const url =
      `${baseUrl}/locations/${encodeURIComponent(location.id)}` +
      `/contact_lists?page.size=${pageSize}`;

    const headers: Record<string, string> = {
      accept: 'application/vnd.api+json',
    };
    if (options.bearerToken) {
      headers.authorization = `Bearer ${options.bearerToken}`;
    }
    if (options.apiKey) {
      headers['x-api-key'] = options.apiKey;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    let body: unknown;
    try {
      const response = await fetchImpl(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new ListProviderError(
          `Contact-list request failed with HTTP ${response.status}`,
          response.status
        );
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof ListProviderError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ListProviderError(
          `Contact-list request timed out after ${options.timeoutMs}ms`
        );
      }
      throw new ListProviderError(
        `Contact-list request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const document = ContactListDocumentSchema.safeParse(body);
    if (!document.success) {
      throw new ListProviderError('Unexpected contact-list response document');
    }

    const lists = document.data.data
      .filter((item) => item.attributes.list_type === 'smart')
      .map((item) => ({
        id: item.id,
        name:
          item.attributes.display_name ||
          item.attributes.name ||
          `List ${item.id}`,
        size: item.attributes.contacts_count ?? 0,
      }));

    logger.debug(
      `Fetched ${lists.length} smart list(s) of ${document.data.data.length}`
    );
    return lists;
  };
}

/** Provider used when no directory is configured */
export const emptyListProvider: ListProvider = async () => [];
