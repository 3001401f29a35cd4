import { DiskCache } from '../caching/DiskCache';
import { Logger } from '../utils/Logger';
import { ServiceClient } from './types';

/**
 * Wraps a client so identical requests are answered from the on-disk cache.
 * Responses must be plain JSON data; they come back from the cache as parsed JSON.
 * Only successful responses are cached.
 */
export class CachedServiceClient<Req, Res> implements ServiceClient<Req, Res> {
  readonly serviceName: string;
  private readonly logger: Logger;

  constructor(
    private readonly inner: ServiceClient<Req, Res>,
    private readonly cache: DiskCache,
    logger?: Logger
  ) {
    this.serviceName = inner.serviceName;
    this.logger = logger || new Logger(`${inner.serviceName}.cache`);
  }

  async send(request: Req): Promise<Res> {
    const key = DiskCache.keyFor({ service: this.serviceName, request });
    const cached = await this.cache.get<Res>(key);
    if (cached !== null) {
      this.logger.info('Using cached response', { key });
      return cached;
    }
    const response = await this.inner.send(request);
    await this.cache.set(key, response);
    return response;
  }
}
