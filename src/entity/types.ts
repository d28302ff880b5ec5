import type { EntityBase } from './entity-base';
import type { NavigationProperty } from '../schema/navigation';

/**
 * Raw record as received from (or destined for) the data service:
 * wire field name → value, with nested records or lists for embedded
 * related entities
 */
export type RawEntityData = Record<string, unknown>;

/**
 * Supplies related entities that were not embedded in the original payload.
 *
 * Implemented by the query layer, which knows how to address the service.
 * The returned payload is an object (or null) for single navigations and a
 * list for collection navigations.
 */
export interface RelatedDataFetcher {
  fetchRelated(entity: EntityBase, navigation: NavigationProperty): Promise<unknown>;
}

/**
 * Class-level metadata shared through the entity class chain
 */
export interface EntityStatics {
  readonly name: string;
  typeName: string;
  collectionName: string;
  urlBase: string;
  fetcher?: RelatedDataFetcher;
  url(): string;
}

/**
 * Concrete entity constructor type
 */
export type EntityClass<T extends EntityBase = EntityBase> =
  (new (rawData?: RawEntityData | null) => T) & EntityStatics;

/**
 * Entity constructor type, including abstract bases
 */
export type AbstractEntityClass<T extends EntityBase = EntityBase> =
  (abstract new (rawData?: RawEntityData | null) => T) & EntityStatics;

/**
 * Type guard for a raw record (a plain object, not a list)
 */
export function isRawEntityData(value: unknown): value is RawEntityData {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
