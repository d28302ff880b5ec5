import 'dotenv/config';
import { configureEntities, entityOptionsFromEnv, stateOf } from '../src';
import type { EntityBase, NavigationProperty, RelatedDataFetcher } from '../src';
import { Product, ServiceBase } from '../debug/schema/service-model';

/**
 * Change Tracking Example
 *
 * Hydrates an entity from a service payload, edits it, and loads a
 * navigation that was not expanded. Related payloads come from an
 * in-memory table keyed by request URL.
 */

const relatedPayloads: Record<string, unknown> = {
  'https://svc/odata/Products(7)/OrderLines': [
    { Id: 100, Quantity: 2 },
    { Id: 101, Quantity: 5 },
  ],
};

class InMemoryFetcher implements RelatedDataFetcher {
  async fetchRelated(entity: EntityBase, navigation: NavigationProperty): Promise<unknown> {
    const url = `${stateOf(entity).instanceUrl}/${navigation.name}`;
    console.log(`GET ${url}`);
    return relatedPayloads[url] ?? null;
  }
}

async function main() {
  console.log('OData Entities - Change Tracking Example\n');

  configureEntities({ logHydration: true, ...entityOptionsFromEnv() });
  ServiceBase.urlBase = process.env.ODATA_SERVICE_URL || 'https://svc/odata/';
  ServiceBase.fetcher = new InMemoryFetcher();

  // Response of GET Products(7)?$expand=Category
  const product = new Product({
    Id: 7,
    ProductName: 'Kettle',
    QuantityInStorage: 12,
    Price: '19.90',
    Category: { Id: 2, CategoryName: 'Kitchen' },
  });

  console.log(`\nLoaded ${product} from ${stateOf(product).instanceUrl}`);
  console.log(`Category: ${product.category?.name}`);
  console.log(`Available: ${product.isProductAvailable()}`);

  product.quantityInStorage = 0;
  product.price = '17.50';

  const state = stateOf(product);
  console.log('\nChanges to send:', state.changedValues());

  // After the service accepted the PATCH
  state.markClean();
  console.log(`Dirty after save: ${state.isDirty}`);

  await state.loadNavigation('OrderLines');
  console.log(`\nOrder lines: ${(product.orderLines ?? []).map(line => String(line)).join(', ')}`);

  // Served from the cache
  await state.loadNavigation('OrderLines');
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
