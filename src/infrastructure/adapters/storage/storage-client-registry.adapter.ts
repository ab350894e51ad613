import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { StorageClientRegistryPort } from '../../../application/ports/output/storage-client-registry.port';
import {
  StorageClientFactory,
  StorageClientHandle,
} from '../../../application/ports/output/storage-client.port';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { STORAGE_CLIENT_FACTORY } from '../../injection-tokens';

/**
 * Storage Client Registry Adapter
 * Lives as long as the application context: handles are built on the first
 * request for a container and reused until the context closes.
 * Rows run sequentially, so the map is never mutated concurrently.
 */
@Injectable()
export class StorageClientRegistryAdapter implements StorageClientRegistryPort, OnModuleDestroy {
  private readonly clients = new Map<string, StorageClientHandle>();
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(STORAGE_CLIENT_FACTORY) private readonly createClient: StorageClientFactory,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(StorageClientRegistryAdapter.name);
  }

  get(containerId: string): StorageClientHandle {
    const cached = this.clients.get(containerId);
    if (cached) {
      return cached;
    }

    const client = this.createClient(containerId);
    this.clients.set(containerId, client);
    this.logger.debug({ containerId, cached: this.clients.size }, 'Storage client created');

    return client;
  }

  clear(): void {
    const count = this.clients.size;
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();

    this.logger.debug({ count }, 'Storage clients released');
  }

  get size(): number {
    return this.clients.size;
  }

  onModuleDestroy(): void {
    this.clear();
  }
}
