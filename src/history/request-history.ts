import { LRUCache } from 'lru-cache';
import { RequestNotFoundError } from '../errors';
import { historyLogger as logger } from '../utils/logger';
import { DetectionResponse } from '../types';

export interface RequestHistoryOptions {
  capacity?: number;
  ttlMs?: number; // 0 keeps entries until evicted by capacity
}

/**
 * Bounded store of recent detection responses, keyed by request id
 */
export class RequestHistory {
  private cache: LRUCache<string, DetectionResponse>;

  constructor(options: RequestHistoryOptions = {}) {
    const capacity = options.capacity ?? 1000;
    this.cache = new LRUCache<string, DetectionResponse>({
      max: capacity,
      ttl: options.ttlMs ?? 0,
      updateAgeOnGet: true,
      dispose: (_response, requestId, reason) => {
        if (reason === 'evict' || reason === 'expire') {
          logger.debug({ requestId, reason }, 'Dropping detection response from history');
        }
      }
    });
  }

  put(response: DetectionResponse): void {
    this.cache.set(response.requestId, response);
  }

  get(requestId: string): DetectionResponse {
    const response = this.cache.get(requestId);
    if (!response) {
      throw new RequestNotFoundError(requestId);
    }
    return response;
  }

  find(requestId: string): DetectionResponse | undefined {
    return this.cache.get(requestId);
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
