import { callLogPageSchema, VapiCall } from '@/lib/types/call-log';
import { PaginationLimitError, TransportError } from '@/lib/errors';

export const MAX_PAGE_SIZE = 100;

export interface VapiServiceConfig {
  url: string;
  bearerToken: string;
  pageSize?: number;
  maxPages?: number;
}

export interface CallLogSource {
  fetchCallLogs(assistantId: string): Promise<VapiCall[]>;
  deduplicateCalls(calls: VapiCall[]): VapiCall[];
}

export class VapiService implements CallLogSource {
  private url: string;
  private bearerToken: string;
  private pageSize: number;
  private maxPages: number;

  constructor(config: VapiServiceConfig) {
    this.url = config.url;
    this.bearerToken = config.bearerToken;
    this.pageSize = config.pageSize ?? MAX_PAGE_SIZE;
    this.maxPages = config.maxPages ?? 1000;
  }

  /**
   * Fetch one page of calls, newest first.
   */
  async getCallLogPage(assistantId: string, createdAtLt?: string): Promise<VapiCall[]> {
    const url = new URL(this.url);
    url.searchParams.set('assistantId', assistantId);
    url.searchParams.set('limit', this.pageSize.toString());
    if (createdAtLt) {
      url.searchParams.set('createdAtLt', createdAtLt);
    }

    const response = await fetch(url.toString(), {
      headers: {
        Authorization: `Bearer ${this.bearerToken}`,
      },
    });

    if (!response.ok) {
      throw new TransportError(
        `Failed to fetch call logs: ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError('Failed to fetch call logs: response body is not JSON', response.status, { cause: error });
    }

    const page = callLogPageSchema.safeParse(body);
    if (!page.success) {
      throw new TransportError(
        `Failed to fetch call logs: unexpected page shape (${page.error.errors[0]?.message ?? 'invalid'})`,
        response.status,
        { cause: page.error }
      );
    }
    return page.data;
  }

  /**
   * Walk every page for an assistant. Each full page moves the `createdAtLt`
   * cursor to the creation time of its last call; a short page ends the walk.
   */
  async fetchCallLogs(assistantId: string): Promise<VapiCall[]> {
    const allCalls: VapiCall[] = [];
    let cursor: string | undefined;

    for (let pageCount = 1; ; pageCount++) {
      if (pageCount > this.maxPages) {
        throw new PaginationLimitError(this.maxPages);
      }

      const calls = await this.getCallLogPage(assistantId, cursor);
      allCalls.push(...calls);

      if (calls.length < this.pageSize) {
        break;
      }

      const last = calls[calls.length - 1];
      if (!last?.createdAt) {
        throw new TransportError(`Failed to fetch call logs: call ${last?.id ?? 'unknown'} has no createdAt to page from`);
      }
      cursor = last.createdAt;
    }

    console.log(`Total calls fetched: ${allCalls.length}`);
    return allCalls;
  }

  deduplicateCalls(calls: VapiCall[]): VapiCall[] {
    const seen = new Set<string>();
    const unique: VapiCall[] = [];

    for (const call of calls) {
      if (call.id) {
        if (seen.has(call.id)) {
          continue;
        }
        seen.add(call.id);
      }
      unique.push(call);
    }

    return unique;
  }
}
