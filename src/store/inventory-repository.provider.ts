import { Logger, Provider } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config';
import { HttpInventoryRepository } from './http-inventory.repository';
import { InMemoryInventoryRepository } from './in-memory-inventory.repository';
import { InventoryRepository } from './inventory.repository';

export const inventoryRepositoryProvider: Provider = {
  provide: InventoryRepository,
  useFactory: (): InventoryRepository => {
    if (APP_CONFIG.store.baseUrl) {
      return new HttpInventoryRepository(APP_CONFIG.store);
    }

    new Logger('InventoryRepository').warn(
      'STORE_BASE_URL is not set; using an empty in-process store',
    );
    return new InMemoryInventoryRepository();
  },
};
